import { LibraryItem, LibraryItemId } from "../entities/library-item.entity.js";

/**
 * Read side of the hosting application's attachment store.
 * Implementations page through ids instead of loading every row.
 */
export interface ILibraryRepository {
  countItems(): Promise<number>;
  /** Ids in ascending order, `limit` at a time starting at `offset`. */
  listItemIds(offset: number, limit: number): Promise<LibraryItemId[]>;
  getItem(id: LibraryItemId): Promise<LibraryItem | null>;
}
