/**
 * @cowrite/collab-core
 *
 * In-process collaboration core: session membership, per-document access
 * control, and an operation-ordered replicated document with anchored
 * annotations.
 *
 * Threading: every call runs synchronously and the core holds no locks.
 * Each document's edits must pass through one DocumentStore in a single total
 * order. Hosts that call the core from several workers must serialize access
 * themselves, e.g. one owner of the whole core or one queue per document.
 * The core performs no I/O; persistence and transport subscribe to the
 * EventBus.
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export {
  createCollabCore,
  createCollabCoreFromEnv,
  type CollabCore,
  type CollabCoreConfig,
} from "./collabCore";
export * from "./permissions";
export * from "./document";
export * from "./events";
export * from "./session";
export * from "./store";
export * from "./audit";
export * from "./observability";
export * from "./protocol";
