/**
 * FileSystem tests
 */

import {
  DuplicateNameError,
  EntryReleasedError,
  InvalidNameError,
  NotFoundError,
  WrongVariantError,
} from "../src/core/errors";
import { EventBus } from "../src/core/eventBus";
import { createLogger, silentLogger } from "../src/core/logger";
import { FileEntry, FileSystem, FolderEntry, type FileSystemOptions } from "../src/core/tree";

function createFs(options: FileSystemOptions = {}): FileSystem {
  return new FileSystem({ logger: silentLogger(), ...options });
}

describe("FileSystem", () => {
  let fs: FileSystem;

  beforeEach(() => {
    fs = createFs();
  });

  describe("basic storage", () => {
    test("should store a file at the root and read it back", () => {
      fs.create(new FileEntry("a", "hello"));
      expect(fs.getContent("a").content()).toBe("hello");
      expect(fs.getContent("/a").content()).toBe("hello");
    });

    test("should create entries relative to the working directory", () => {
      fs.create(new FolderEntry("d"));
      fs.changeDirectory("d");
      fs.create(new FileEntry("b", "x"));
      fs.changeDirectory("/");

      expect(fs.getContent("/d/b").content()).toBe("x");
      expect(fs.getContent("d/b").content()).toBe("x");
    });

    test("should create into a target folder path", () => {
      fs.createFolder("d");
      fs.create(new FileEntry("c", "3"), "/d");
      fs.changeDirectory("/d");
      fs.create(new FileEntry("up", "4"), "..");

      expect(fs.getFile("/d/c").content()).toBe("3");
      expect(fs.getFile("/up").content()).toBe("4");
    });

    test("should reject a duplicate name by default", () => {
      fs.create(new FileEntry("a", "1"));

      expect(() => fs.create(new FileEntry("a", "2"))).toThrow(DuplicateNameError);
      expect(() => fs.create(new FileEntry("a", "2"), ".", "reject")).toThrow(DuplicateNameError);
      expect(fs.getContent("a").content()).toBe("1");
    });

    test("should overwrite when asked per call", () => {
      fs.create(new FileEntry("a", "1"));
      fs.create(new FileEntry("a", "2"), ".", "overwrite");
      expect(fs.getContent("a").content()).toBe("2");
    });

    test("should overwrite when the store policy says so", () => {
      const store = createFs({ duplicatePolicy: "overwrite" });
      store.createFile("a", "1");
      store.createFile("a", "2");

      expect(store.duplicatePolicy).toBe("overwrite");
      expect(store.getFile("a").content()).toBe("2");
      expect(store.root.childCount).toBe(1);
    });

    test("should remove entries", () => {
      fs.create(new FileEntry("a", "1"));

      expect(fs.remove("a")).toBe(true);
      expect(fs.root.has("a")).toBe(false);
      expect(() => fs.getContent("a")).toThrow(NotFoundError);
      expect(fs.remove("a")).toBe(false);
    });

    test("should not remove the root or navigation paths", () => {
      fs.createFolder("d");
      fs.changeDirectory("d");

      expect(fs.remove("/")).toBe(false);
      expect(fs.remove(".")).toBe(false);
      expect(fs.remove("..")).toBe(false);
      expect(fs.root.has("d")).toBe(true);
    });

    test("should return stable handles", () => {
      fs.createFile("a", "1");
      const first = fs.getFile("a");
      fs.createFile("b", "2");
      expect(fs.getFile("a")).toBe(first);
    });
  });

  describe("lookups", () => {
    beforeEach(() => {
      fs.createFolder("d");
      fs.createFile("/d/n.txt", "hi");
    });

    test("should resolve folders", () => {
      expect(fs.getFolder("/")).toBe(fs.root);
      expect(fs.getFolder("d/")).toBe(fs.root.getFolder("d"));
      expect(fs.getContainer("d")).toBe(fs.root.getFolder("d"));
    });

    test("should refuse a file lookup on a folder path", () => {
      expect(() => fs.getFile("/")).toThrow(WrongVariantError);
      expect(() => fs.getFile("d")).toThrow(WrongVariantError);
      expect(() => fs.getFolder("/d/n.txt")).toThrow(WrongVariantError);
    });

    test("should report missing paths", () => {
      expect(() => fs.getFile("/d/missing")).toThrow(NotFoundError);
      expect(() => fs.getFile("/missing/n.txt")).toThrow(NotFoundError);
      expect(() => fs.get("/d/missing")).toThrow('No entry named "missing" in d');
    });

    test("should check existence", () => {
      expect(fs.exists("/d/n.txt")).toBe(true);
      expect(fs.exists("d")).toBe(true);
      expect(fs.exists("/d/nope")).toBe(false);
      expect(fs.exists("/d/n.txt/x")).toBe(false);
    });

    test("should describe an entry", () => {
      expect(fs.stat("/d/n.txt")).toMatchObject({
        name: "n.txt",
        kind: "file",
        path: "/d/n.txt",
        size: 2,
      });
      expect(fs.stat("/")).toMatchObject({ name: "/", kind: "folder", path: "/", size: 1 });
    });

    test("should list a folder in insertion order", () => {
      fs.createFolder("/d/sub");
      expect(fs.list("/d").map((stat) => [stat.name, stat.kind])).toEqual([
        ["n.txt", "file"],
        ["sub", "folder"],
      ]);
    });
  });

  describe("createFile and createFolder", () => {
    test("should refuse paths that end without a name", () => {
      expect(() => fs.createFile("/")).toThrow(InvalidNameError);
      expect(() => fs.createFolder("..")).toThrow(InvalidNameError);
    });

    test("should need existing parents unless recursive", () => {
      expect(() => fs.createFolder("/p/q")).toThrow(NotFoundError);

      const r = fs.createFolder("/p/q/r", { recursive: true });
      expect(fs.pathOf(r)).toBe("/p/q/r");
      expect(fs.createFolder("/p/q/r", { recursive: true })).toBe(r);
    });

    test("should fail a recursive create through a file", () => {
      fs.createFile("f");
      expect(() => fs.createFolder("f/x", { recursive: true })).toThrow(WrongVariantError);
    });
  });

  describe("working directory", () => {
    test("should start at the root", () => {
      expect(fs.workingDirectory()).toBe("/");
      expect(fs.cwd()).toBe(fs.root);
    });

    test("should follow cd through relative and absolute paths", () => {
      fs.createFolder("/d/e", { recursive: true });

      fs.changeDirectory("d");
      expect(fs.workingDirectory()).toBe("/d");
      fs.cd("e");
      expect(fs.getWorkingDirectory()).toBe("/d/e");
      fs.changeDirectory("..");
      expect(fs.workingDirectory()).toBe("/d");
      fs.changeDirectory("/");
      expect(fs.workingDirectory()).toBe("/");
      fs.changeDirectory("..");
      expect(fs.workingDirectory()).toBe("/");
    });

    test("should keep the working directory when cd fails", () => {
      fs.createFolder("d");
      fs.createFile("/d/f");
      fs.changeDirectory("d");

      expect(() => fs.changeDirectory("missing")).toThrow(NotFoundError);
      expect(() => fs.changeDirectory("f")).toThrow(WrongVariantError);
      expect(fs.workingDirectory()).toBe("/d");
    });

    test("should follow a rename of an ancestor", () => {
      fs.createFolder("/d/e", { recursive: true });
      fs.changeDirectory("/d/e");
      fs.get("/d").rename("dd");
      expect(fs.workingDirectory()).toBe("/dd/e");
    });

    test("should fall back to the parent when the working directory is removed", () => {
      fs.createFolder("/d/e", { recursive: true });
      fs.changeDirectory("/d/e");

      fs.remove("/d/e");
      expect(fs.workingDirectory()).toBe("/d");
    });

    test("should fall back when an ancestor is removed through a handle", () => {
      fs.createFolder("/d/e/f", { recursive: true });
      fs.changeDirectory("/d/e/f");

      fs.getFolder("/d").remove("e");
      expect(fs.workingDirectory()).toBe("/d");
    });

    test("should fall back when an ancestor is overwritten", () => {
      fs.createFolder("/d/e", { recursive: true });
      fs.changeDirectory("/d/e");

      fs.create(new FileEntry("d", "x"), "/", "overwrite");
      expect(fs.workingDirectory()).toBe("/");
    });

    test("should announce directory changes", () => {
      const moves: Array<{ from: string | null; to: string }> = [];
      fs.events.on("DirectoryChangeEvent", (evt) => {
        if (evt.type === "DirectoryChangeEvent") moves.push(evt.payload);
      });
      fs.createFolder("/d/e", { recursive: true });

      fs.changeDirectory("/d/e");
      fs.remove("/d");

      expect(moves).toEqual([
        { from: "/", to: "/d/e" },
        { from: null, to: "/" },
      ]);
    });
  });

  describe("search and walk", () => {
    beforeEach(() => {
      fs.createFolder("/x");
      fs.createFolder("/y/z", { recursive: true });
      fs.createFile("/x/b", "1");
      fs.createFile("/y/z/b", "2");
      fs.createFolder("/y/b");
    });

    test("should find every entry with the name in breadth-first order", () => {
      expect(fs.search("b").map((entry) => fs.pathOf(entry))).toEqual(["/x/b", "/y/b", "/y/z/b"]);
    });

    test("should filter by kind", () => {
      expect(fs.search("b", { kind: "file" }).map((entry) => fs.pathOf(entry))).toEqual([
        "/x/b",
        "/y/z/b",
      ]);
      expect(fs.search("b", { kind: "folder" })).toHaveLength(1);
    });

    test("should return nothing for unknown names and never match the root", () => {
      expect(fs.search("nothing")).toEqual([]);
      expect(fs.search("/")).toEqual([]);
    });

    test("should visit every entry exactly once", () => {
      const paths = [...fs.walk()].map((entry) => entry.path());
      expect(paths).toEqual(["/x", "/y", "/x/b", "/y/z", "/y/b", "/y/z/b"]);
      expect(new Set(paths).size).toBe(paths.length);
    });
  });

  describe("pathOf", () => {
    test("should refuse entries from another tree", () => {
      const other = createFs();
      const foreign = other.createFile("a");
      expect(() => fs.pathOf(foreign)).toThrow(NotFoundError);
      expect(() => fs.pathOf(new FileEntry("loose"))).toThrow(NotFoundError);
    });

    test("should refuse released entries", () => {
      const file = fs.createFile("a");
      fs.remove("a");
      expect(() => fs.pathOf(file)).toThrow(EntryReleasedError);
    });
  });

  describe("events", () => {
    test("should publish tree changes on the bus", () => {
      const bus = new EventBus();
      const store = createFs({ eventBus: bus });

      store.createFile("a", "1");
      store.createFile("a", "2", "overwrite");
      store.remove("a");

      const actions = bus
        .getHistory({ type: "TreeChangeEvent" })
        .map((evt) => (evt.type === "TreeChangeEvent" ? evt.payload.action : null));
      expect(actions).toEqual(["insert", "overwrite", "remove"]);
    });

    test("should ignore changes made by other stores on a shared bus", () => {
      const bus = new EventBus();
      const raw: string[] = [];
      const logger = createLogger({ level: "debug", format: "json" }, { write: (msg: string) => void raw.push(msg) });
      const watched = createFs({ eventBus: bus, logger });
      const other = createFs({ eventBus: bus });
      watched.createFolder("d");
      watched.changeDirectory("d");
      raw.length = 0;

      other.createFolder("d");
      other.remove("d");

      expect(raw).toEqual([]);
      expect(watched.workingDirectory()).toBe("/d");
      expect(bus.getHistory({ type: "TreeChangeEvent" })).toHaveLength(3);
    });

    test("should list released ids on removal", () => {
      fs.createFolder("/d/e", { recursive: true });
      const d = fs.getFolder("/d");
      const e = fs.getFolder("/d/e");
      fs.events.clearHistory();

      fs.remove("/d");

      const [evt] = fs.events.getHistory({ type: "TreeChangeEvent" });
      expect(evt.type === "TreeChangeEvent" ? evt.payload.releasedIds : []).toEqual([d.id, e.id]);
    });
  });

  describe("wide folders", () => {
    const WIDE = 200_000;

    test("should remove a folder with a very large number of children", () => {
      const store = createFs({ eventBus: new EventBus({ maxHistorySize: 10 }) });
      const big = store.createFolder("big");
      for (let i = 0; i < WIDE; i++) big.insert(new FileEntry(`f${i}`));
      store.changeDirectory("big");
      store.events.clearHistory();

      expect(store.remove("/big")).toBe(true);

      expect(store.root.has("big")).toBe(false);
      expect(big.isReleased()).toBe(true);
      expect(store.workingDirectory()).toBe("/");
      const [evt] = store.events.getHistory({ type: "TreeChangeEvent" });
      expect(evt.type === "TreeChangeEvent" ? evt.payload.releasedIds.length : 0).toBe(WIDE + 1);
    }, 120_000);
  });
});
