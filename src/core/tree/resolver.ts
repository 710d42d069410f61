/**
 * Path resolution against a folder tree. Read-only: walks handles, never
 * mutates.
 */

import type { FolderEntry } from "./entry";
import { ROOT_NAME, splitPath } from "./paths";

/**
 * Walk `path` from `start` and return the folder it lands on.
 *
 * - "" and "." stay put
 * - "/" jumps to the root of start's tree
 * - ".." goes to the parent; at the root it stays at the root
 * - any other segment descends into that child folder (NotFoundError when
 *   missing, WrongVariantError when it is a file)
 */
export function resolvePath(start: FolderEntry, path: string | readonly string[]): FolderEntry {
  const segments = typeof path === "string" ? splitPath(path) : path;
  let current = start;

  for (const segment of segments) {
    if (segment === "" || segment === ".") continue;

    if (segment === ROOT_NAME) {
      current = current.root();
    } else if (segment === "..") {
      if (current.hasParent()) current = current.parent();
    } else {
      current = current.getFolder(segment);
    }
  }

  return current;
}
