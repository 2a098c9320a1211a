import { posix } from "node:path";

export class ObjectKeyService {
  /**
   * Collapses every run of "/" into one. Paths are often assembled from a
   * directory that already ends in "/" plus a file name.
   */
  static collapseSeparators(path: string): string {
    return path.replace(/\/{2,}/g, "/");
  }

  /**
   * Remote key for a file path relative to the uploads dir: prefix + path,
   * separators collapsed. No encoding or case folding, so keys stay byte-equal
   * to the relative path.
   */
  static deriveKey(relativePath: string, prefix: string): string {
    return ObjectKeyService.collapseSeparators(`${prefix}/${relativePath}`);
  }

  /** Directory of a relative path, "" for a bare file name. */
  static directoryOf(relativePath: string): string {
    const dir = posix.dirname(relativePath);
    return dir === "." ? "" : dir;
  }

  /** `file` placed in the same directory as `relativePath`. */
  static sibling(relativePath: string, file: string): string {
    const dir = ObjectKeyService.directoryOf(relativePath);
    return dir ? `${dir}/${file}` : file;
  }
}
