/**
 * Entry names and path segments.
 *
 * A text path iterates the way a POSIX path does: a leading "/" becomes a
 * "/" segment, the rest splits on "/" with empty pieces kept (they resolve
 * as no-ops).
 */

import { z } from "zod";
import { InvalidNameError } from "../errors";

export const ROOT_NAME = "/";

export const MAX_NAME_LENGTH = 255;

export const EntryNameSchema = z
  .string()
  .min(1, "name must not be empty")
  .max(MAX_NAME_LENGTH, `name exceeds ${MAX_NAME_LENGTH} characters`)
  .refine((name) => name !== "." && name !== "..", "name must not be . or ..")
  .refine((name) => !name.includes("/"), "name must not contain /")
  .refine((name) => !name.includes("\0"), "name must not contain null bytes");

export function validateName(name: string): string {
  const result = EntryNameSchema.safeParse(name);
  if (!result.success) {
    throw new InvalidNameError(name, result.error.issues[0]?.message ?? "invalid name");
  }
  return result.data;
}

export function isSpecialSegment(segment: string): boolean {
  return segment === "" || segment === "." || segment === ".." || segment === ROOT_NAME;
}

export function splitPath(path: string): string[] {
  if (path === "") return [];

  const segments: string[] = [];
  let rest = path;
  if (rest.startsWith("/")) {
    segments.push(ROOT_NAME);
    rest = rest.replace(/^\/+/, "");
    if (rest === "") return segments;
  }

  return segments.concat(rest.split("/"));
}

export interface ParentSplit {
  directory: string[];
  /** Final segment, or null when it names no child (".", "..", "", "/") */
  name: string | null;
}

/**
 * Split a path into the segments of its directory part and its final name.
 */
export function splitParent(path: string | readonly string[]): ParentSplit {
  const segments = typeof path === "string" ? splitPath(path) : [...path];
  const last = segments[segments.length - 1];

  if (last === undefined || isSpecialSegment(last)) {
    return { directory: segments, name: null };
  }

  return { directory: segments.slice(0, -1), name: last };
}

export function joinPath(names: readonly string[]): string {
  return ROOT_NAME + names.join("/");
}
