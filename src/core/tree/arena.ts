/**
 * Node arena: every record of one tree, keyed by a stable ULID.
 *
 * Parent and child edges are ids, never object references, so copying or
 * moving a subtree re-keys records instead of patching pointers. A record
 * that leaves the arena is gone for good; ids are never reused.
 */

import { ulid } from "ulid";
import { EntryReleasedError, WrongVariantError } from "../errors";
import { validateName } from "./paths";
import type {
  FileRecord,
  FolderRecord,
  NodeId,
  NodeInit,
  NodeRecord,
  TreeChange,
} from "./types";

/**
 * A handle the arena caches per id. Handles follow their records when a
 * subtree moves to another arena.
 */
export interface ArenaHandle {
  readonly id: NodeId;
  rebind(arena: EntryArena): void;
}

export interface ArenaBinding {
  arena: EntryArena;
  id: NodeId;
}

export interface ArenaConfig {
  /** A detached arena holds one free-standing entry that an insert may move elsewhere */
  detached?: boolean;
  onChange?: (change: TreeChange) => void;
}

export class EntryArena {
  private records: Map<NodeId, NodeRecord> = new Map();
  private handles: Map<NodeId, ArenaHandle> = new Map();
  private rootId: NodeId | null = null;
  readonly detached: boolean;
  private onChange?: (change: TreeChange) => void;

  constructor(config: ArenaConfig = {}) {
    this.detached = config.detached ?? false;
    this.onChange = config.onChange;
  }

  /**
   * Allocate a free-standing entry in its own arena.
   */
  static detachedEntry(init: NodeInit): ArenaBinding {
    const arena = new EntryArena({ detached: true });
    const id = arena.allocate(init);
    arena.rootId = id;
    return { arena, id };
  }

  /**
   * Deep-copy a subtree into a new detached arena.
   */
  static detachedCopy(source: EntryArena, id: NodeId): ArenaBinding {
    const arena = new EntryArena({ detached: true });
    const copyId = arena.copyFrom(source, id);
    arena.rootId = copyId;
    return { arena, id: copyId };
  }

  /**
   * Allocate the root folder of a tree. The root name skips validation.
   */
  allocateRoot(name: string): NodeId {
    const id = this.allocate({ kind: "folder", name }, false);
    this.rootId = id;
    return id;
  }

  allocate(init: NodeInit, validate = true): NodeId {
    const name = validate ? validateName(init.name) : init.name;
    const id = ulid();
    const now = Date.now();
    const record: NodeRecord =
      init.kind === "file"
        ? { kind: "file", id, name, parent: null, content: init.content, createdAt: now, updatedAt: now }
        : { kind: "folder", id, name, parent: null, children: new Map(), createdAt: now, updatedAt: now };
    this.records.set(id, record);
    return id;
  }

  get root(): NodeId | null {
    return this.rootId;
  }

  has(id: NodeId): boolean {
    return this.records.has(id);
  }

  get size(): number {
    return this.records.size;
  }

  get(id: NodeId): NodeRecord {
    const record = this.records.get(id);
    if (!record) throw new EntryReleasedError(id);
    return record;
  }

  file(id: NodeId): FileRecord {
    const record = this.get(id);
    if (record.kind !== "file") throw new WrongVariantError(record.name, "file");
    return record;
  }

  folder(id: NodeId): FolderRecord {
    const record = this.get(id);
    if (record.kind !== "folder") throw new WrongVariantError(record.name, "folder");
    return record;
  }

  parentOf(id: NodeId): NodeId | null {
    return this.get(id).parent;
  }

  /**
   * Topmost ancestor of a node (the node itself when it has no parent).
   */
  topOf(id: NodeId): NodeId {
    let current = id;
    let parent = this.parentOf(current);
    while (parent !== null) {
      current = parent;
      parent = this.parentOf(current);
    }
    return current;
  }

  /**
   * Names from below the topmost ancestor down to the node.
   */
  namesFromTop(id: NodeId): string[] {
    const names: string[] = [];
    let current = this.get(id);
    while (current.parent !== null) {
      names.unshift(current.name);
      current = this.get(current.parent);
    }
    return names;
  }

  handle(id: NodeId): ArenaHandle | undefined {
    return this.handles.get(id);
  }

  cacheHandle(handle: ArenaHandle): void {
    this.handles.set(handle.id, handle);
  }

  /**
   * Attach a parentless node under a folder. An existing child of the same
   * name must already have been dropped; its slot is reused.
   */
  link(parentId: NodeId, childId: NodeId): void {
    const parent = this.folder(parentId);
    const child = this.get(childId);
    child.parent = parentId;
    parent.children.set(child.name, childId);
    parent.updatedAt = Date.now();
  }

  /**
   * Detach a node from its parent without dropping it.
   */
  unlink(id: NodeId): void {
    const record = this.get(id);
    if (record.parent === null) return;
    const parent = this.folder(record.parent);
    parent.children.delete(record.name);
    parent.updatedAt = Date.now();
    record.parent = null;
  }

  /**
   * Drop a node and its whole subtree. The parent's mapping is left alone,
   * so the caller either reuses the slot or unlinks first.
   */
  drop(id: NodeId): NodeId[] {
    return this.forget([...this.subtree(id)]);
  }

  /**
   * Unlink and drop. The subtree is collected before the parent is touched.
   */
  release(id: NodeId): NodeId[] {
    const released = [...this.subtree(id)];
    this.unlink(id);
    return this.forget(released);
  }

  /**
   * Breadth-first ids of a node and everything below it.
   */
  *subtree(id: NodeId): Generator<NodeId> {
    const queue: NodeId[] = [id];
    for (let i = 0; i < queue.length; i++) {
      const current = queue[i];
      yield current;
      const record = this.get(current);
      if (record.kind !== "folder") continue;
      for (const childId of record.children.values()) queue.push(childId);
    }
  }

  private forget(ids: NodeId[]): NodeId[] {
    for (const nodeId of ids) {
      this.records.delete(nodeId);
      this.handles.delete(nodeId);
    }
    return ids;
  }

  /**
   * Deep-copy a subtree of another (or this) arena into this one under fresh
   * ids. The copy comes back parentless; every copied record points at the
   * copies, never at the source.
   */
  copyFrom(source: EntryArena, id: NodeId): NodeId {
    const ids = new Map<NodeId, NodeId>();
    const now = Date.now();
    const order = [...source.subtree(id)];

    for (const oldId of order) {
      const record = source.get(oldId);
      const newId = ulid();
      ids.set(oldId, newId);
      const copy: NodeRecord =
        record.kind === "file"
          ? { ...record, id: newId, parent: null, createdAt: now, updatedAt: now }
          : { ...record, id: newId, parent: null, children: new Map(), createdAt: now, updatedAt: now };
      this.records.set(newId, copy);
    }

    // order is breadth-first, so every parent copy exists before its children are wired
    for (const oldId of order) {
      const record = source.get(oldId);
      if (record.kind !== "folder") continue;
      const parentCopy = ids.get(oldId);
      if (parentCopy === undefined) continue;
      for (const childId of record.children.values()) {
        const childCopy = ids.get(childId);
        if (childCopy !== undefined) this.link(parentCopy, childCopy);
      }
    }

    const rootCopy = ids.get(id);
    if (rootCopy === undefined) throw new EntryReleasedError(id);
    return rootCopy;
  }

  /**
   * Move a detached arena's whole tree into this arena. Records keep their
   * ids and cached handles are rebound, so callers' references stay valid.
   */
  moveFrom(source: EntryArena, id: NodeId): void {
    for (const nodeId of [...source.subtree(id)]) {
      this.records.set(nodeId, source.get(nodeId));
      source.records.delete(nodeId);
      const handle = source.handles.get(nodeId);
      if (handle) {
        source.handles.delete(nodeId);
        this.handles.set(nodeId, handle);
        handle.rebind(this);
      }
    }
    if (source.rootId === id) source.rootId = null;
  }

  rename(id: NodeId, name: string): void {
    const record = this.get(id);
    const previous = record.name;
    if (record.parent !== null) {
      const parent = this.folder(record.parent);
      // rebuild to keep the child's slot
      parent.children = new Map(
        [...parent.children].map(([key, value]): [string, NodeId] =>
          key === previous ? [name, value] : [key, value]
        )
      );
    }
    record.name = name;
    record.updatedAt = Date.now();
  }

  setContent(id: NodeId, content: string): void {
    const record = this.file(id);
    record.content = content;
    record.updatedAt = Date.now();
  }

  notify(change: TreeChange): void {
    this.onChange?.(change);
  }
}
