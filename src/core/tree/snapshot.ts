/**
 * Plain-object snapshots of a folder tree.
 */

import { z } from "zod";
import { DuplicateNameError, InvalidNameError, InvalidSnapshotError } from "../errors";
import { FileEntry, FolderEntry, type Entry } from "./entry";

export interface FileSnapshot {
  kind: "file";
  name: string;
  content: string;
}

export interface FolderSnapshot {
  kind: "folder";
  name: string;
  children: EntrySnapshot[];
}

export type EntrySnapshot = FileSnapshot | FolderSnapshot;

export interface TreeSnapshot {
  version: 1;
  root: FolderSnapshot;
}

const FileSnapshotSchema = z.object({
  kind: z.literal("file"),
  name: z.string(),
  content: z.string(),
});

const EntrySnapshotSchema: z.ZodType<EntrySnapshot> = z.lazy(() =>
  z.union([FileSnapshotSchema, FolderSnapshotSchema])
);

const FolderSnapshotSchema: z.ZodType<FolderSnapshot> = z.lazy(() =>
  z.object({
    kind: z.literal("folder"),
    name: z.string(),
    children: z.array(EntrySnapshotSchema),
  })
);

export const TreeSnapshotSchema = z.object({
  version: z.literal(1),
  root: FolderSnapshotSchema,
});

export function toSnapshot(entry: FileEntry): FileSnapshot;
export function toSnapshot(entry: FolderEntry): FolderSnapshot;
export function toSnapshot(entry: Entry): EntrySnapshot;
export function toSnapshot(entry: Entry): EntrySnapshot {
  if (entry.isFile()) {
    return { kind: "file", name: entry.name, content: entry.content() };
  }
  return {
    kind: "folder",
    name: entry.name,
    children: [...entry.asFolder()].map((child) => toSnapshot(child)),
  };
}

export function exportSnapshot(folder: FolderEntry): TreeSnapshot {
  return { version: 1, root: toSnapshot(folder) };
}

export function parseSnapshot(value: unknown): TreeSnapshot {
  const result = TreeSnapshotSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidSnapshotError(
      "does not match the snapshot schema",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Build a detached entry from a snapshot node.
 */
export function fromSnapshot(snapshot: EntrySnapshot): Entry {
  if (snapshot.kind === "file") return new FileEntry(snapshot.name, snapshot.content);
  return new FolderEntry(snapshot.name, snapshot.children.map(fromSnapshot));
}

function buildChildren(snapshot: FolderSnapshot): FolderEntry {
  try {
    return new FolderEntry("snapshot", snapshot.children.map(fromSnapshot));
  } catch (e) {
    if (e instanceof DuplicateNameError || e instanceof InvalidNameError) {
      throw new InvalidSnapshotError(e.message);
    }
    throw e;
  }
}

/**
 * Replace a folder's children with the snapshot's. The snapshot is fully
 * built before the folder is touched, so a bad snapshot changes nothing.
 */
export function restoreSnapshot(target: FolderEntry, value: unknown): void {
  const snapshot = parseSnapshot(value);
  target.assign(buildChildren(snapshot.root));
}
