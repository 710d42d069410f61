/**
 * Tree Type Definitions
 */

export type NodeId = string;

export type EntryKind = "file" | "folder";

/**
 * What an insert does when the target folder already holds the name.
 */
export type DuplicateNamePolicy = "overwrite" | "reject";

export interface EntryMeta {
  createdAt: number;
  updatedAt: number;
}

interface RecordBase extends EntryMeta {
  id: NodeId;
  name: string;
  parent: NodeId | null;
}

export interface FileRecord extends RecordBase {
  kind: "file";
  content: string;
}

export interface FolderRecord extends RecordBase {
  kind: "folder";
  children: Map<string, NodeId>;
}

export type NodeRecord = FileRecord | FolderRecord;

export type NodeInit =
  | { kind: "file"; name: string; content: string }
  | { kind: "folder"; name: string };

export type TreeChangeAction = "insert" | "overwrite" | "remove" | "rename" | "content" | "assign";

export interface TreeChange {
  action: TreeChangeAction;
  id: NodeId;
  name: string;
  parentId: NodeId | null;
  releasedIds: NodeId[];
  previousName?: string;
}

export interface EntryStat extends EntryMeta {
  name: string;
  kind: EntryKind;
  path: string;
  /** UTF-8 byte length for files, child count for folders */
  size: number;
}
