export {
  applyOperationToContent,
  characterCount,
  clampPosition,
  describeOperation,
  foldOperations,
  splitCharacters,
} from "./editOperation";
export { ReplicatedDocument, type ReplicatedDocumentConfig } from "./replicatedDocument";
