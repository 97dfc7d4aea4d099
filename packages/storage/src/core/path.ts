/**
 * Path normalization
 *
 * Every user-supplied path becomes an ObjectId before it reaches an
 * accessor. Ids are root-relative:
 * - '/'            the root
 * - 'a/c/file'     an object
 * - 'a/c/'         a directory (trailing slash)
 */

import { ErrorKind, StorageError } from "./errors.js";

/**
 * Normalized, immutable object identifier
 *
 * Construct through normalizePath(); the constructor is not exported on the
 * public surface.
 */
export class ObjectId {
  static readonly ROOT = new ObjectId("/");

  private constructor(readonly path: string) {
    Object.freeze(this);
  }

  /** @internal */
  static fromNormalized(path: string): ObjectId {
    return path === "/" ? ObjectId.ROOT : new ObjectId(path);
  }

  isRoot(): boolean {
    return this.path === "/";
  }

  /** Directory ids end with '/' (the root included) */
  isDir(): boolean {
    return this.path.endsWith("/");
  }

  /**
   * Last segment, keeping the trailing '/' of directories
   *
   * @example
   * normalizePath('a/c/file').name() // => 'file'
   * normalizePath('a/c/').name()     // => 'c/'
   */
  name(): string {
    if (this.isRoot()) return "/";
    const trimmed = this.isDir() ? this.path.slice(0, -1) : this.path;
    const idx = trimmed.lastIndexOf("/");
    const base = trimmed.slice(idx + 1);
    return this.isDir() ? `${base}/` : base;
  }

  /**
   * Directory containing this id; the root is its own parent
   */
  parent(): ObjectId {
    if (this.isRoot()) return this;
    const trimmed = this.isDir() ? this.path.slice(0, -1) : this.path;
    const idx = trimmed.lastIndexOf("/");
    if (idx < 0) return ObjectId.ROOT;
    return ObjectId.fromNormalized(trimmed.slice(0, idx + 1));
  }

  /**
   * Resolve a child path under this directory id
   */
  join(child: string): ObjectId {
    if (!this.isDir()) {
      throw new StorageError(
        ErrorKind.InvalidPath,
        "resolve",
        this.path,
        "cannot join onto a non-directory id",
      );
    }
    const base = this.isRoot() ? "" : this.path;
    return normalizePath(`${base}${child}`);
  }

  equals(other: ObjectId): boolean {
    return this.path === other.path;
  }

  toString(): string {
    return this.path;
  }

  toJSON(): string {
    return this.path;
  }
}

/**
 * Canonicalize a raw path
 *
 * - backslashes become '/'
 * - repeated separators collapse, '.' segments drop
 * - '..' removes the previous segment; escaping the root throws InvalidPath
 * - a trailing '/' marks a directory
 *
 * Idempotent: normalizePath(normalizePath(p).path) equals normalizePath(p).
 *
 * @example
 * normalizePath('a//b/../c/') // => ObjectId('a/c/')
 * normalizePath('/x/./y')     // => ObjectId('x/y')
 * normalizePath('')           // => ObjectId('/')
 */
export function normalizePath(raw: string): ObjectId {
  const unified = raw.trim().replace(/\\/g, "/");
  const segments: string[] = [];

  for (const segment of unified.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (segments.length === 0) {
        throw new StorageError(
          ErrorKind.InvalidPath,
          "resolve",
          raw,
          "path escapes the root",
        );
      }
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  if (segments.length === 0) {
    return ObjectId.ROOT;
  }

  const joined = segments.join("/");
  // A trailing '/.' or '/..' still denotes a directory
  const lastRaw = unified.split("/").filter((s) => s !== "").pop();
  const isDir =
    unified.endsWith("/") || lastRaw === "." || lastRaw === "..";
  return ObjectId.fromNormalized(isDir ? `${joined}/` : joined);
}

// ============================================================================
// Backend Path Helpers
// ============================================================================

/**
 * Normalize a backend root to the '/x/y/' form ('/' when empty)
 */
export function normalizeRoot(root: string): string {
  const id = normalizePath(root);
  if (id.isRoot()) return "/";
  return id.isDir() ? `/${id.path}` : `/${id.path}/`;
}

/**
 * Backend key for an id under a root, without a leading '/'
 *
 * @example
 * buildAbsPath('/data/', normalizePath('a/b')) // => 'data/a/b'
 * buildAbsPath('/', ObjectId.ROOT)             // => ''
 */
export function buildAbsPath(root: string, id: ObjectId): string {
  const normalizedRoot = normalizeRoot(root);
  const rel = id.isRoot() ? "" : id.path;
  return `${normalizedRoot}${rel}`.replace(/^\/+/, "");
}

/**
 * Inverse of buildAbsPath: root-relative id path for a backend key
 *
 * @throws StorageError(Unexpected) when the key lies outside the root
 */
export function buildRelPath(root: string, absKey: string): string {
  const normalizedRoot = normalizeRoot(root);
  const withSlash = `/${absKey.replace(/^\/+/, "")}`;
  if (!withSlash.startsWith(normalizedRoot)) {
    throw new StorageError(
      ErrorKind.Unexpected,
      "resolve",
      absKey,
      `key is outside root ${normalizedRoot}`,
    );
  }
  const rel = withSlash.slice(normalizedRoot.length);
  return rel === "" ? "/" : rel;
}
