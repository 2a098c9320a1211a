export type LibraryItemId = number;

/** Named derived rendition of an attachment, e.g. a thumbnail size. */
export interface LibraryItemVariant {
  name: string;
  /** File name inside the primary file's directory. May be empty when the store registered the size without a file. */
  file: string;
}

/**
 * One attachment as recorded by the hosting library.
 * Owned by the library store; read-only here.
 */
export interface LibraryItem {
  id: LibraryItemId;
  /** Primary file path relative to the uploads dir. Null when none is registered. */
  primaryPath: string | null;
  /** File name of the unscaled original kept next to a web-optimised primary. */
  originalFile?: string | null;
  variants: LibraryItemVariant[];
}

/** Labels for the two non-variant renditions. Variants use their size name. */
export const PRIMARY_VARIANT = "primary";
export const ORIGINAL_VARIANT = "true_original";

/** One physical file of an attachment, with the remote key it maps to. */
export interface FileEntry {
  localPath: string;
  relativePath: string;
  objectKey: string;
  variant: string;
}
