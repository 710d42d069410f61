/**
 * src/cli/shell.ts
 * Line-oriented command scripts run against a FileSystem.
 *
 * One command per line; blank lines and lines starting with "#" are skipped.
 * A failing command reports "error: CODE: message" and the script goes on.
 */

import { isTreeError } from "../core/errors";
import type { TreeLogger } from "../core/logger";
import type { Entry, FileSystem, FolderEntry } from "../core/tree";
import { formatTable } from "./utils/printTable";

export interface ScriptResult {
  output: string[];
  failures: number;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

type CommandHandler = (fs: FileSystem, args: string[], rest: string) => string[];

function need(args: string[], count: number, usage: string): void {
  if (args.length < count) throw new UsageError(`usage: ${usage}`);
}

/**
 * Text after the first `skip` words of the argument string, spacing kept.
 */
function textAfter(rest: string, skip: number): string {
  let remaining = rest;
  for (let i = 0; i < skip; i++) {
    remaining = remaining.replace(/^\s*\S+/, "");
  }
  return remaining.replace(/^\s/, "");
}

function describeTree(folder: FolderEntry, depth: number, lines: string[] = []): string[] {
  for (const child of folder) {
    lines.push(`${"  ".repeat(depth)}${label(child)}`);
    if (child.isFolder()) describeTree(child, depth + 1, lines);
  }
  return lines;
}

function label(entry: Entry): string {
  return entry.isFolder() ? `${entry.name}/` : entry.name;
}

const commands: Record<string, CommandHandler> = {
  mkdir: (fs, args) => {
    const recursive = args[0] === "-p";
    const paths = recursive ? args.slice(1) : args;
    need(paths, 1, "mkdir [-p] <path>...");
    for (const path of paths) fs.createFolder(path, { recursive });
    return [];
  },

  write: (fs, args, rest) => {
    need(args, 1, "write <path> <text...>");
    const text = textAfter(rest, 1);
    if (fs.exists(args[0])) fs.getFile(args[0]).changeContent(text);
    else fs.createFile(args[0], text);
    return [];
  },

  append: (fs, args, rest) => {
    need(args, 1, "append <path> <text...>");
    const text = textAfter(rest, 1);
    if (fs.exists(args[0])) fs.getFile(args[0]).append(text);
    else fs.createFile(args[0], text);
    return [];
  },

  cat: (fs, args) => {
    need(args, 1, "cat <path>");
    return [fs.getFile(args[0]).content()];
  },

  rm: (fs, args) => {
    need(args, 1, "rm <path>");
    return fs.remove(args[0]) ? [] : [`rm: nothing removed at ${args[0]}`];
  },

  cd: (fs, args) => {
    fs.changeDirectory(args[0] ?? "/");
    return [];
  },

  pwd: (fs) => [fs.workingDirectory()],

  ls: (fs, args) => {
    const rows = fs.list(args[0] ?? ".").map((stat) => [
      stat.kind === "folder" ? `${stat.name}/` : stat.name,
      stat.kind,
      String(stat.size),
    ]);
    return formatTable(["NAME", "KIND", "SIZE"], rows);
  },

  find: (fs, args) => {
    need(args, 1, "find <name>");
    return fs.search(args[0]).map((entry) => fs.pathOf(entry));
  },

  mv: (fs, args) => {
    need(args, 2, "mv <path> <new-name>");
    fs.get(args[0]).rename(args[1]);
    return [];
  },

  tree: (fs, args) => {
    const folder = fs.getFolder(args[0] ?? ".");
    return describeTree(folder, 1, [fs.pathOf(folder)]);
  },
};

export const COMMAND_NAMES = Object.keys(commands);

/**
 * Run one script line and return what it prints.
 */
export function executeLine(fs: FileSystem, line: string): string[] {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#")) return [];

  const [name, ...args] = trimmed.split(/\s+/);
  const rest = trimmed.slice(name.length).replace(/^\s+/, "");
  const handler = commands[name];
  if (!handler) throw new UsageError(`unknown command "${name}"`);
  return handler(fs, args, rest);
}

export function runScript(fs: FileSystem, script: string, logger?: TreeLogger): ScriptResult {
  const output: string[] = [];
  let failures = 0;

  script.split(/\r?\n/).forEach((line, index) => {
    try {
      for (const out of executeLine(fs, line)) output.push(out);
    } catch (e) {
      if (isTreeError(e)) {
        output.push(`error: ${e.code}: ${e.message}`);
      } else if (e instanceof UsageError) {
        output.push(`error: ${e.message}`);
      } else {
        throw e;
      }
      failures++;
      logger?.debug("script line failed", { line: index + 1, command: line.trim() });
    }
  });

  return { output, failures };
}
