/**
 * Entry model: FileEntry holds content, FolderEntry holds named children.
 *
 * Entries are handles onto arena records. A handle built with `new` lives in
 * its own detached arena until it is inserted somewhere; inserting it moves
 * the record (and the handle) into the target tree. Inserting an entry that
 * already sits in a tree stores a deep copy instead.
 *
 * Once its record is removed or overwritten a handle is released and every
 * call on it throws EntryReleasedError.
 */

import {
  DuplicateNameError,
  NoParentError,
  NotFoundError,
  WrongVariantError,
} from "../errors";
import { EntryArena, type ArenaBinding, type ArenaHandle } from "./arena";
import { joinPath, ROOT_NAME, validateName } from "./paths";
import type {
  DuplicateNamePolicy,
  EntryKind,
  EntryMeta,
  FileRecord,
  FolderRecord,
  NodeId,
  NodeRecord,
} from "./types";

export type Entry = FileEntry | FolderEntry;

abstract class EntryBase implements ArenaHandle {
  abstract readonly kind: EntryKind;
  readonly id: NodeId;
  protected arena: EntryArena;

  protected constructor(binding: ArenaBinding) {
    this.arena = binding.arena;
    this.id = binding.id;
    this.arena.cacheHandle(this);
  }

  /**
   * @internal called by the arena when the record moves trees
   */
  rebind(arena: EntryArena): void {
    this.arena = arena;
  }

  protected record(): NodeRecord {
    return this.arena.get(this.id);
  }

  get name(): string {
    return this.record().name;
  }

  get meta(): EntryMeta {
    const { createdAt, updatedAt } = this.record();
    return { createdAt, updatedAt };
  }

  rename(newName: string): void {
    const name = validateName(newName);
    const record = this.record();
    const previousName = record.name;
    if (name === previousName) return;

    if (record.parent !== null) {
      const parent = this.arena.folder(record.parent);
      if (parent.children.has(name)) throw new DuplicateNameError(name, parent.name);
    }

    this.arena.rename(this.id, name);
    this.arena.notify({
      action: "rename",
      id: this.id,
      name,
      parentId: record.parent,
      releasedIds: [],
      previousName,
    });
  }

  isFile(): this is FileEntry {
    return this.kind === "file";
  }

  isFolder(): this is FolderEntry {
    return this.kind === "folder";
  }

  asFile(): FileEntry {
    if (this instanceof FileEntry) return this;
    throw new WrongVariantError(this.name, "file");
  }

  asFolder(): FolderEntry {
    if (this instanceof FolderEntry) return this;
    throw new WrongVariantError(this.name, "folder");
  }

  isReleased(): boolean {
    return !this.arena.has(this.id);
  }

  isAttached(): boolean {
    return this.record().parent !== null;
  }

  hasParent(): boolean {
    return this.isAttached();
  }

  parent(): FolderEntry {
    const record = this.record();
    if (record.parent === null) throw new NoParentError(record.name);
    return entryFor(this.arena, record.parent).asFolder();
  }

  /**
   * Id of the topmost folder above this entry (its own id when parentless).
   */
  treeRootId(): NodeId {
    return this.arena.topOf(this.id);
  }

  /**
   * Absolute path inside the entry's own tree.
   */
  path(): string {
    return joinPath(this.arena.namesFromTop(this.id));
  }

  abstract clone(): Entry;

  /**
   * Bring another entry's record into this entry's arena and return its id
   * there: a free-standing entry is moved, anything else is deep-copied.
   */
  protected adoptFrom(entry: EntryBase): NodeId {
    const source = entry.arena;
    const record = source.get(entry.id);
    if (source !== this.arena && source.detached && record.parent === null && source.root === entry.id) {
      this.arena.moveFrom(source, entry.id);
      return entry.id;
    }
    return this.arena.copyFrom(source, entry.id);
  }

  protected childIds(): NodeId[] {
    const record = this.record();
    return record.kind === "folder" ? [...record.children.values()] : [];
  }
}

export class FileEntry extends EntryBase {
  readonly kind = "file";

  constructor(name: string, content = "", binding?: ArenaBinding) {
    super(binding ?? EntryArena.detachedEntry({ kind: "file", name, content }));
  }

  protected record(): FileRecord {
    return this.arena.file(this.id);
  }

  content(): string {
    return this.record().content;
  }

  changeContent(content: string): void {
    const record = this.record();
    this.arena.setContent(this.id, content);
    this.arena.notify({
      action: "content",
      id: this.id,
      name: record.name,
      parentId: record.parent,
      releasedIds: [],
    });
  }

  append(content: string): void {
    this.changeContent(this.content() + content);
  }

  /** UTF-8 byte length of the content */
  get size(): number {
    return Buffer.byteLength(this.content(), "utf8");
  }

  clone(): FileEntry {
    return new FileEntry(this.name, this.content());
  }
}

export class FolderEntry extends EntryBase implements Iterable<Entry> {
  readonly kind = "folder";

  constructor(name: string, children: Iterable<Entry> = [], binding?: ArenaBinding) {
    super(binding ?? EntryArena.detachedEntry({ kind: "folder", name }));
    if (binding) return;

    // check every name first: a failure must not leave earlier children moved in
    const initial = [...children];
    const seen = new Set<string>();
    for (const child of initial) {
      const childName = validateName(child.name);
      if (seen.has(childName)) throw new DuplicateNameError(childName, name);
      seen.add(childName);
    }
    for (const child of initial) this.insert(child, "reject");
  }

  /**
   * Root folder of a fresh tree.
   */
  static createRoot(arena: EntryArena): FolderEntry {
    const id = arena.allocateRoot(ROOT_NAME);
    return new FolderEntry(ROOT_NAME, [], { arena, id });
  }

  protected record(): FolderRecord {
    return this.arena.folder(this.id);
  }

  has(name: string): boolean {
    return this.record().children.has(name);
  }

  get(name: string): Entry | undefined {
    const id = this.record().children.get(name);
    return id === undefined ? undefined : entryFor(this.arena, id);
  }

  getFile(name: string): FileEntry {
    return this.require(name).asFile();
  }

  getFolder(name: string): FolderEntry {
    return this.require(name).asFolder();
  }

  get childCount(): number {
    return this.record().children.size;
  }

  isRoot(): boolean {
    return this.record().parent === null;
  }

  /**
   * Topmost folder of this tree.
   */
  root(): FolderEntry {
    return entryFor(this.arena, this.arena.topOf(this.id)).asFolder();
  }

  /**
   * Store an entry under its own name. With "reject" an existing name fails
   * and nothing changes; with "overwrite" the existing child (of either
   * kind) is released and the new entry takes its slot.
   */
  insert(entry: FileEntry, policy?: DuplicateNamePolicy): FileEntry;
  insert(entry: FolderEntry, policy?: DuplicateNamePolicy): FolderEntry;
  insert(entry: Entry, policy?: DuplicateNamePolicy): Entry;
  insert(entry: Entry, policy: DuplicateNamePolicy = "reject"): Entry {
    const parent = this.record();
    // a copied root carries the unvalidated name "/"
    const name = validateName(entry.name);
    const existing = parent.children.get(name);
    if (existing !== undefined && policy === "reject") {
      throw new DuplicateNameError(name, parent.name);
    }

    // copy before dropping: the incoming entry may live inside the one it replaces
    const incoming = this.adoptFrom(entry);
    const releasedIds = existing === undefined ? [] : this.arena.drop(existing);
    this.arena.link(this.id, incoming);

    this.arena.notify({
      action: existing === undefined ? "insert" : "overwrite",
      id: incoming,
      name,
      parentId: this.id,
      releasedIds,
    });
    return entryFor(this.arena, incoming);
  }

  /**
   * Remove a child and everything below it.
   */
  remove(name: string): boolean {
    const childId = this.record().children.get(name);
    if (childId === undefined) return false;

    const releasedIds = this.arena.release(childId);
    this.arena.notify({
      action: "remove",
      id: childId,
      name,
      parentId: this.id,
      releasedIds,
    });
    return true;
  }

  /**
   * Replace every child with a deep copy of the source folder's children.
   * This folder keeps its own name and place.
   */
  assign(source: FolderEntry): void {
    const copies = source.childIds().map((id) => this.arena.copyFrom(source.arena, id));
    const releasedIds = this.childIds().flatMap((id) => this.arena.release(id));
    for (const copy of copies) this.arena.link(this.id, copy);

    const record = this.record();
    this.arena.notify({
      action: "assign",
      id: this.id,
      name: record.name,
      parentId: record.parent,
      releasedIds,
    });
  }

  *children(): Generator<Entry> {
    for (const id of this.record().children.values()) {
      yield entryFor(this.arena, id);
    }
  }

  [Symbol.iterator](): Iterator<Entry> {
    return this.children();
  }

  clone(): FolderEntry {
    const binding = EntryArena.detachedCopy(this.arena, this.id);
    return entryFor(binding.arena, binding.id).asFolder();
  }

  private require(name: string): Entry {
    const child = this.get(name);
    if (!child) throw new NotFoundError(name, this.record().name);
    return child;
  }
}

/**
 * The cached handle for a record, created on first use.
 */
export function entryFor(arena: EntryArena, id: NodeId): Entry {
  const cached = arena.handle(id);
  if (cached instanceof FileEntry || cached instanceof FolderEntry) return cached;

  const record = arena.get(id);
  return record.kind === "file"
    ? new FileEntry(record.name, "", { arena, id })
    : new FolderEntry(record.name, [], { arena, id });
}
