export { DocumentStore, type DocumentStoreConfig } from "./documentStore";
