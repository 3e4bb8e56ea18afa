import * as fs from 'fs';

/**
 * The part of a stat result the removal policy looks at.
 */
export interface EntryStats {
  isDirectory(): boolean;
}

/**
 * Filesystem primitives consumed by scoped paths. The default binds to
 * `node:fs`; tests pass their own to simulate failures that cannot be
 * produced on a real disk when running as root.
 */
export interface FileSystem {
  /**
   * Stats the entry without following a final symlink. Returns
   * `undefined` when nothing is there.
   */
  lstat(target: string): EntryStats | undefined;

  /** Removes a directory and everything beneath it. */
  removeDirectory(target: string): void;

  /** Removes a single non-directory entry. */
  removeEntry(target: string): void;
}

export const nodeFileSystem: FileSystem = {
  lstat: (target) => fs.lstatSync(target, { throwIfNoEntry: false }),
  removeDirectory: (target) => {
    fs.rmSync(target, { recursive: true, force: true });
  },
  removeEntry: (target) => {
    fs.unlinkSync(target);
  },
};

/**
 * True when `err` is a Node system error carrying the given `code`.
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return (
    typeof err === 'object' && err !== null && 'code' in err && err.code === code
  );
}

/**
 * True when `err` says nothing can be at the path: the entry is
 * missing (ENOENT) or a parent component is not a directory (ENOTDIR).
 */
export function isAbsentError(err: unknown): boolean {
  return hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR');
}

/**
 * Stats `target` through `fileSystem`, mapping every way of being
 * absent to `undefined`.
 *
 * @throws Whatever `lstat` throws, other than ENOENT and ENOTDIR.
 */
export function statEntry(
  target: string,
  fileSystem: FileSystem = nodeFileSystem,
): EntryStats | undefined {
  try {
    return fileSystem.lstat(target);
  } catch (err: unknown) {
    if (isAbsentError(err)) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Removes whatever is at `target`. Directories go recursively; every
 * other kind of entry, symlinks included, is unlinked on its own so a
 * link's target is never touched.
 *
 * An entry that is missing, that sits under a non-directory, or that
 * disappears between the type check and the removal, counts as
 * already removed.
 *
 * @param target Path to remove.
 * @param fileSystem Primitives to remove it with.
 * @returns True when something was removed, false when nothing was there.
 * @throws Whatever the primitives throw, other than ENOENT and ENOTDIR.
 */
export function removePath(
  target: string,
  fileSystem: FileSystem = nodeFileSystem,
): boolean {
  const stats = statEntry(target, fileSystem);
  if (!stats) {
    return false;
  }

  try {
    if (stats.isDirectory()) {
      fileSystem.removeDirectory(target);
    } else {
      fileSystem.removeEntry(target);
    }
  } catch (err: unknown) {
    if (isAbsentError(err)) {
      return false;
    }
    throw err;
  }

  return true;
}
