import { join } from "node:path";
import { ILibraryRepository } from "../repositories/library.repository.js";
import {
  FileEntry,
  LibraryItem,
  LibraryItemId,
  ORIGINAL_VARIANT,
  PRIMARY_VARIANT,
} from "../entities/library-item.entity.js";
import { ObjectKeyService } from "./object-key.service.js";

/**
 * Expands library attachments into the physical files they own.
 */
export class InventoryService {
  constructor(
    private library: ILibraryRepository,
    private localRoot: string,
    private prefix: string,
  ) {}

  countItems(): Promise<number> {
    return this.library.countItems();
  }

  /** Yields ids a page at a time until the store runs out. */
  async *idPages(pageSize: number): AsyncGenerator<LibraryItemId[]> {
    let offset = 0;
    for (;;) {
      const ids = await this.library.listItemIds(offset, pageSize);
      if (ids.length === 0) return;
      yield ids;
      if (ids.length < pageSize) return;
      offset += ids.length;
    }
  }

  async filesFor(id: LibraryItemId): Promise<FileEntry[]> {
    const item = await this.library.getItem(id);
    if (!item) return [];
    return InventoryService.expand(item, this.localRoot, this.prefix);
  }

  /**
   * Primary first, then the true original when it differs from the primary,
   * then every variant that has a file. Items without a primary yield nothing.
   */
  static expand(item: LibraryItem, localRoot: string, prefix: string): FileEntry[] {
    const primary = item.primaryPath;
    if (!primary) return [];

    const entry = (relativePath: string, variant: string): FileEntry => ({
      localPath: join(localRoot, relativePath),
      relativePath,
      objectKey: ObjectKeyService.deriveKey(relativePath, prefix),
      variant,
    });

    const files: FileEntry[] = [entry(primary, PRIMARY_VARIANT)];

    if (item.originalFile) {
      const original = ObjectKeyService.sibling(primary, item.originalFile);
      if (original !== primary) files.push(entry(original, ORIGINAL_VARIANT));
    }

    for (const variant of item.variants) {
      if (!variant.file) continue;
      files.push(entry(ObjectKeyService.sibling(primary, variant.file), variant.name));
    }

    return files;
  }
}
