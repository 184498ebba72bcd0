import { posix } from "node:path";

export const { join, normalize } = posix;

/**
 * Handle to a location inside a (possibly virtual) filesystem.
 *
 * The resolver never touches the disk through this handle; it only carries the
 * root a lookup strategy starts from. `fs` names the filesystem the path lives
 * in, `path` is a normalized POSIX path inside it.
 */
export interface FileSystemPath {
  readonly fs: string;
  readonly path: string;
}

export const DEFAULT_FILESYSTEM = "project";

/**
 * Creates a frozen {@link FileSystemPath}.
 *
 * @example
 * ```ts
 * fileSystemPath("/app/./src/../");
 * // { fs: "project", path: "/app" }
 * ```
 */
export function fileSystemPath(path: string, fs: string = DEFAULT_FILESYSTEM): FileSystemPath {
  let normalized = normalize(path);

  // Trailing slashes carry no meaning for a directory handle
  if (normalized.length > 1 && normalized.endsWith("/")) normalized = normalized.slice(0, -1);

  return Object.freeze({ fs, path: normalized });
}

export function fileSystemPathEquals(a: FileSystemPath, b: FileSystemPath): boolean {
  return a.fs === b.fs && a.path === b.path;
}

/** `project:/app/src` style rendering, used in log output and cache keys */
export function formatFileSystemPath(value: FileSystemPath): string {
  return `${value.fs}:${value.path}`;
}
