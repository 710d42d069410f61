/**
 * Error types for memtree
 */

export type TreeErrorCode =
  | "NOT_FOUND"
  | "WRONG_VARIANT"
  | "DUPLICATE_NAME"
  | "NO_PARENT"
  | "INVALID_NAME"
  | "ENTRY_RELEASED"
  | "INVALID_SNAPSHOT"
  | "CONFIG_ERROR";

export class TreeError extends Error {
  constructor(
    message: string,
    public readonly code: TreeErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TreeError";
    Object.setPrototypeOf(this, TreeError.prototype);
  }
}

export class NotFoundError extends TreeError {
  constructor(name: string, parent?: string) {
    super(
      parent ? `No entry named "${name}" in ${parent}` : `No entry named "${name}"`,
      "NOT_FOUND",
      { name, parent }
    );
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class WrongVariantError extends TreeError {
  constructor(name: string, expected: "file" | "folder") {
    super(
      `"${name}" does not refer to a ${expected}`,
      "WRONG_VARIANT",
      { name, expected }
    );
    this.name = "WrongVariantError";
    Object.setPrototypeOf(this, WrongVariantError.prototype);
  }
}

export class DuplicateNameError extends TreeError {
  constructor(name: string, parent?: string) {
    super(
      `An entry named "${name}" already exists${parent ? ` in ${parent}` : ""}`,
      "DUPLICATE_NAME",
      { name, parent }
    );
    this.name = "DuplicateNameError";
    Object.setPrototypeOf(this, DuplicateNameError.prototype);
  }
}

export class NoParentError extends TreeError {
  constructor(name: string) {
    super(`"${name}" has no parent`, "NO_PARENT", { name });
    this.name = "NoParentError";
    Object.setPrototypeOf(this, NoParentError.prototype);
  }
}

export class InvalidNameError extends TreeError {
  constructor(name: string, reason: string) {
    super(`Invalid entry name "${name}": ${reason}`, "INVALID_NAME", { name, reason });
    this.name = "InvalidNameError";
    Object.setPrototypeOf(this, InvalidNameError.prototype);
  }
}

export class EntryReleasedError extends TreeError {
  constructor(id: string) {
    super(`Entry ${id} has been removed from its tree`, "ENTRY_RELEASED", { id });
    this.name = "EntryReleasedError";
    Object.setPrototypeOf(this, EntryReleasedError.prototype);
  }
}

export class InvalidSnapshotError extends TreeError {
  constructor(message: string, issues?: string[]) {
    super(`Invalid snapshot: ${message}`, "INVALID_SNAPSHOT", { issues });
    this.name = "InvalidSnapshotError";
    Object.setPrototypeOf(this, InvalidSnapshotError.prototype);
  }
}

export class ConfigError extends TreeError {
  constructor(message: string, source?: string) {
    super(`Configuration error: ${message}`, "CONFIG_ERROR", { source });
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function isTreeError(value: unknown): value is TreeError {
  return value instanceof TreeError;
}
