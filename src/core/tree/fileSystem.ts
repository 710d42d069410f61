/**
 * FileSystem: the root store.
 *
 * Owns one tree rooted at "/", tracks a working directory, and addresses
 * entries by path. Relative paths resolve from the working directory.
 */

import { EventBus } from "../eventBus";
import { InvalidNameError, isTreeError, NotFoundError, WrongVariantError } from "../errors";
import { createLogger, type TreeLogger } from "../logger";
import { EntryArena } from "./arena";
import { entryFor, FileEntry, FolderEntry, type Entry } from "./entry";
import { isSpecialSegment, splitParent } from "./paths";
import { resolvePath } from "./resolver";
import { exportSnapshot, restoreSnapshot, type TreeSnapshot } from "./snapshot";
import type { DuplicateNamePolicy, EntryKind, EntryStat, NodeId, TreeChange } from "./types";

export interface FileSystemOptions {
  duplicatePolicy?: DuplicateNamePolicy;
  eventBus?: EventBus;
  logger?: TreeLogger;
}

export interface SearchOptions {
  kind?: EntryKind;
}

export interface CreateFolderOptions {
  /** Create missing intermediate folders too */
  recursive?: boolean;
}

export class FileSystem {
  readonly root: FolderEntry;
  readonly events: EventBus;
  readonly duplicatePolicy: DuplicateNamePolicy;
  private readonly arena: EntryArena;
  private readonly logger: TreeLogger;
  private cwdId: NodeId;

  constructor(options: FileSystemOptions = {}) {
    this.duplicatePolicy = options.duplicatePolicy ?? "reject";
    this.logger = (options.logger ?? createLogger()).child({ component: "filesystem" });
    this.events = options.eventBus ?? new EventBus({ logger: this.logger });
    // the store follows its own arena, never other stores sharing the bus
    this.arena = new EntryArena({
      onChange: (change) => {
        this.events.emit({ type: "TreeChangeEvent", payload: change });
        this.onTreeChange(change);
      },
    });
    this.root = FolderEntry.createRoot(this.arena);
    this.cwdId = this.root.id;
  }

  static fromSnapshot(snapshot: unknown, options: FileSystemOptions = {}): FileSystem {
    const fs = new FileSystem(options);
    restoreSnapshot(fs.root, snapshot);
    return fs;
  }

  /**
   * Folder the working directory denotes.
   */
  cwd(): FolderEntry {
    return entryFor(this.arena, this.cwdId).asFolder();
  }

  workingDirectory(): string {
    return this.cwd().path();
  }

  getWorkingDirectory(): string {
    return this.workingDirectory();
  }

  changeDirectory(path: string): FolderEntry {
    return this.guard("changeDirectory", path, () => {
      const target = resolvePath(this.cwd(), path);
      const from = this.workingDirectory();
      this.cwdId = target.id;
      const to = this.workingDirectory();
      this.logger.debug("working directory changed", { from, to });
      this.events.emit({ type: "DirectoryChangeEvent", payload: { from, to } });
      return target;
    });
  }

  cd(path: string): FolderEntry {
    return this.changeDirectory(path);
  }

  getFile(path: string): FileEntry {
    return this.guard("getFile", path, () => {
      const { directory, name } = splitParent(path);
      const folder = resolvePath(this.cwd(), directory);
      if (name === null) throw new WrongVariantError(folder.name, "file");
      return folder.getFile(name);
    });
  }

  getFolder(path: string): FolderEntry {
    return this.guard("getFolder", path, () => {
      const { directory, name } = splitParent(path);
      const folder = resolvePath(this.cwd(), directory);
      return name === null ? folder : folder.getFolder(name);
    });
  }

  getContent(path: string): FileEntry {
    return this.getFile(path);
  }

  getContainer(path: string): FolderEntry {
    return this.getFolder(path);
  }

  get(path: string): Entry {
    return this.guard("get", path, () => {
      const { directory, name } = splitParent(path);
      const folder = resolvePath(this.cwd(), directory);
      if (name === null) return folder;
      const entry = folder.get(name);
      if (!entry) throw new NotFoundError(name, folder.name);
      return entry;
    });
  }

  exists(path: string): boolean {
    try {
      this.get(path);
      return true;
    } catch (e) {
      if (isTreeError(e) && (e.code === "NOT_FOUND" || e.code === "WRONG_VARIANT")) return false;
      throw e;
    }
  }

  /**
   * Insert an entry into the folder `path` names (the working directory by
   * default).
   */
  create(entry: FileEntry, path?: string, policy?: DuplicateNamePolicy): FileEntry;
  create(entry: FolderEntry, path?: string, policy?: DuplicateNamePolicy): FolderEntry;
  create(entry: Entry, path?: string, policy?: DuplicateNamePolicy): Entry;
  create(entry: Entry, path = ".", policy?: DuplicateNamePolicy): Entry {
    return this.guard("create", path, () => {
      const folder = resolvePath(this.cwd(), path);
      return folder.insert(entry, policy ?? this.duplicatePolicy);
    });
  }

  createFile(path: string, content = "", policy?: DuplicateNamePolicy): FileEntry {
    return this.guard("createFile", path, () => {
      const { directory, name } = splitParent(path);
      if (name === null) throw new InvalidNameError(path, "path does not end in a name");
      const folder = resolvePath(this.cwd(), directory);
      return folder.insert(new FileEntry(name, content), policy ?? this.duplicatePolicy);
    });
  }

  createFolder(path: string, options: CreateFolderOptions = {}): FolderEntry {
    return this.guard("createFolder", path, () => {
      const { directory, name } = splitParent(path);
      if (name === null) throw new InvalidNameError(path, "path does not end in a name");
      const parent = options.recursive ? this.ensureFolders(directory) : resolvePath(this.cwd(), directory);
      if (options.recursive) {
        const existing = parent.get(name);
        if (existing) return existing.asFolder();
      }
      return parent.insert(new FolderEntry(name), this.duplicatePolicy);
    });
  }

  /**
   * Remove the entry at `path` with everything below it. The root and
   * paths ending in ".", ".." or "/" name nothing removable.
   */
  remove(path: string): boolean {
    return this.guard("remove", path, () => {
      const { directory, name } = splitParent(path);
      if (name === null) return false;
      const folder = resolvePath(this.cwd(), directory);
      return folder.remove(name);
    });
  }

  /**
   * Every entry named `name`, in breadth-first order from the root.
   */
  search(name: string, options: SearchOptions = {}): Entry[] {
    const found: Entry[] = [];
    for (const entry of this.walk()) {
      if (entry.name !== name) continue;
      if (options.kind && entry.kind !== options.kind) continue;
      found.push(entry);
    }
    return found;
  }

  /**
   * Breadth-first walk over every entry below the root.
   */
  *walk(): Generator<Entry> {
    const queue: FolderEntry[] = [this.root];
    for (let i = 0; i < queue.length; i++) {
      for (const child of queue[i]) {
        yield child;
        if (child.isFolder()) queue.push(child);
      }
    }
  }

  pathOf(entry: Entry): string {
    if (entry.treeRootId() !== this.root.id) {
      throw new NotFoundError(entry.name, "this file system");
    }
    return entry.path();
  }

  stat(path: string): EntryStat {
    return this.describe(this.get(path));
  }

  list(path = "."): EntryStat[] {
    return [...this.getFolder(path)].map((entry) => this.describe(entry));
  }

  snapshot(): TreeSnapshot {
    return exportSnapshot(this.root);
  }

  restore(snapshot: unknown): void {
    this.guard("restore", "/", () => restoreSnapshot(this.root, snapshot));
  }

  private describe(entry: Entry): EntryStat {
    return {
      name: entry.name,
      kind: entry.kind,
      path: this.pathOf(entry),
      size: entry.isFile() ? entry.size : entry.asFolder().childCount,
      ...entry.meta,
    };
  }

  private ensureFolders(segments: readonly string[]): FolderEntry {
    let current = this.cwd();
    for (const segment of segments) {
      if (isSpecialSegment(segment)) {
        current = resolvePath(current, [segment]);
        continue;
      }
      const existing = current.get(segment);
      current = existing ? existing.asFolder() : current.insert(new FolderEntry(segment), "reject");
    }
    return current;
  }

  /**
   * Keep the working directory inside the tree: when a change releases it,
   * fall back to the folder the released subtree hung from.
   */
  private onTreeChange(change: TreeChange): void {
    this.logger.debug(`tree ${change.action}`, { id: change.id, name: change.name, released: change.releasedIds.length });

    if (!change.releasedIds.includes(this.cwdId)) return;
    // assign keeps the folder itself and releases only what was below it
    const holder = change.action === "assign" ? change.id : change.parentId;
    this.cwdId = holder !== null && this.arena.has(holder) ? holder : this.root.id;
    const to = this.workingDirectory();
    this.logger.debug("working directory released", { to });
    this.events.emit({ type: "DirectoryChangeEvent", payload: { from: null, to } });
  }

  private guard<T>(operation: string, path: string, run: () => T): T {
    try {
      const result = run();
      this.logger.debug(operation, { operation, path });
      return result;
    } catch (e) {
      if (isTreeError(e)) {
        this.logger.debug(`${operation} failed`, { operation, path, code: e.code });
      }
      throw e;
    }
  }
}
