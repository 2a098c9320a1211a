import { IStorageService } from "../domain/services/storage.service.js";
import { ILocalFileService } from "../domain/services/local-file.service.js";
import { InventoryService } from "../domain/services/inventory.service.js";
import { RemoteIndex } from "../domain/entities/remote-index.entity.js";
import { FileEntry } from "../domain/entities/library-item.entity.js";
import {
  VerifyCounters,
  createVerifyCounters,
} from "../domain/entities/counter-set.entity.js";
import {
  FileOutcomeListener,
  ItemProgressListener,
  ReconcileResult,
  VerifyOptions,
  classify,
} from "../domain/types.js";
import { walkLibrary } from "./library-walker.js";

export interface ReconcileLibraryRequest {
  index: RemoteIndex;
  options: Readonly<VerifyOptions>;
  totalItems: number;
  pageSize: number;
  concurrency?: number;
  onProgress?: ItemProgressListener;
  onFileOutcome?: FileOutcomeListener;
}

/**
 * Classifies every library file against the remote index and applies the
 * requested repairs.
 *
 * | local | remote | outcome                                                 |
 * |-------|--------|---------------------------------------------------------|
 * | yes   | no     | s3_missing; re-upload with reuploadMissing               |
 * | yes   | yes    | local_and_s3_exist; clean local with cleanupLocal alone  |
 * | no    | yes    | s3_exists_local_missing (offloaded)                      |
 * | no    | no     | local_missing_s3_missing, reported only                  |
 *
 * Dry runs skip the storage and disk calls but count exactly what a fully
 * successful run would, so a preview can be compared with the real summary.
 */
export class ReconcileLibraryUseCase {
  constructor(
    private storage: IStorageService,
    private localFiles: ILocalFileService,
    private inventory: InventoryService,
  ) {}

  async execute(request: ReconcileLibraryRequest): Promise<ReconcileResult> {
    const counters = createVerifyCounters();
    const visitedKeys = new Set<string>();

    await walkLibrary(
      this.inventory,
      request.totalItems,
      {
        pageSize: request.pageSize,
        concurrency: request.concurrency,
        onProgress: request.onProgress,
      },
      async (_id, files) => {
        counters.increment("wp_attachments_scanned");
        for (const entry of files) {
          visitedKeys.add(entry.objectKey);
          const outcome = await this.reconcileFile(
            entry,
            request.index,
            request.options,
            counters,
          );
          request.onFileOutcome?.(entry, outcome);
        }
      },
    );

    return { counters, visitedKeys };
  }

  private async reconcileFile(
    entry: FileEntry,
    index: RemoteIndex,
    options: Readonly<VerifyOptions>,
    counters: VerifyCounters,
  ): Promise<string> {
    counters.increment("wp_files_scanned");

    const localExists = await this.localFiles.exists(entry.localPath);
    const remoteExists = index.has(entry.objectKey);
    if (localExists) counters.increment("local_files_exist");

    const classification = classify(localExists, remoteExists);
    switch (classification) {
      case "remote_missing": {
        counters.increment("s3_missing");
        if (!options.reuploadMissing) return classification;
        return `${classification}:${await this.reupload(entry, options, counters)}`;
      }
      case "both_present": {
        counters.increment("local_and_s3_exist");
        if (!options.cleanupLocal || options.reuploadMissing) return classification;
        return `${classification}:${await this.cleanup(entry, options, counters)}`;
      }
      case "offloaded_ok":
        counters.increment("s3_exists_local_missing");
        return classification;
      case "both_missing":
        counters.increment("local_missing_s3_missing");
        return classification;
    }
  }

  private async reupload(
    entry: FileEntry,
    options: Readonly<VerifyOptions>,
    counters: VerifyCounters,
  ): Promise<string> {
    if (!options.dryRun) {
      const uploaded = await this.storage.putObject(entry.localPath, entry.objectKey);
      if (!uploaded) {
        counters.increment("s3_reupload_failed");
        return "reupload_failed";
      }
    }
    counters.increment("s3_reuploaded");
    if (!options.cleanupLocal) return "reuploaded";
    return `reuploaded,${await this.cleanup(entry, options, counters)}`;
  }

  private async cleanup(
    entry: FileEntry,
    options: Readonly<VerifyOptions>,
    counters: VerifyCounters,
  ): Promise<string> {
    if (options.dryRun || (await this.localFiles.remove(entry.localPath))) {
      counters.increment("local_cleaned");
      return "cleaned";
    }
    counters.increment("local_cleanup_failed");
    return "cleanup_failed";
  }
}
