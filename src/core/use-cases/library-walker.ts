import PQueue from "p-queue";
import { InventoryService } from "../domain/services/inventory.service.js";
import {
  FileEntry,
  LibraryItemId,
} from "../domain/entities/library-item.entity.js";
import { ItemProgressListener } from "../domain/types.js";

export interface WalkOptions {
  pageSize: number;
  /** Items of one page handled in parallel. Defaults to 1 (strictly sequential). */
  concurrency?: number;
  onProgress?: ItemProgressListener;
}

/**
 * Walks every library item page by page and hands its files to `visit`.
 * Each item is visited exactly once; with concurrency 1 items complete in id order.
 * A rejected visit stops the walk after the current page settles.
 */
export async function walkLibrary(
  inventory: InventoryService,
  totalItems: number,
  options: WalkOptions,
  visit: (id: LibraryItemId, files: FileEntry[]) => Promise<void>,
): Promise<number> {
  const queue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? 1) });
  let done = 0;

  for await (const ids of inventory.idPages(options.pageSize)) {
    const tasks = ids.map((id) =>
      queue.add(async () => {
        const files = await inventory.filesFor(id);
        await visit(id, files);
        done++;
        options.onProgress?.(done, Math.max(done, totalItems));
      }),
    );
    const settled = await Promise.allSettled(tasks);
    for (const result of settled) {
      if (result.status === "rejected") throw result.reason;
    }
  }

  return done;
}
