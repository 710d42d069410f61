/**
 * In-memory folder tree: entries, path resolution and the root store.
 */

export { FileSystem } from "./fileSystem";
export type { CreateFolderOptions, FileSystemOptions, SearchOptions } from "./fileSystem";
export { FileEntry, FolderEntry, entryFor } from "./entry";
export type { Entry } from "./entry";
export { EntryArena } from "./arena";
export type { ArenaBinding, ArenaConfig, ArenaHandle } from "./arena";
export { resolvePath } from "./resolver";
export {
  EntryNameSchema,
  MAX_NAME_LENGTH,
  ROOT_NAME,
  isSpecialSegment,
  joinPath,
  splitParent,
  splitPath,
  validateName,
} from "./paths";
export type { ParentSplit } from "./paths";
export {
  TreeSnapshotSchema,
  exportSnapshot,
  fromSnapshot,
  parseSnapshot,
  restoreSnapshot,
  toSnapshot,
} from "./snapshot";
export type { EntrySnapshot, FileSnapshot, FolderSnapshot, TreeSnapshot } from "./snapshot";
export type {
  DuplicateNamePolicy,
  EntryKind,
  EntryMeta,
  EntryStat,
  NodeId,
  TreeChange,
  TreeChangeAction,
} from "./types";
