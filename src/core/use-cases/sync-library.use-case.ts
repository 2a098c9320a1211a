import { IStorageService } from "../domain/services/storage.service.js";
import { ILocalFileService } from "../domain/services/local-file.service.js";
import { InventoryService } from "../domain/services/inventory.service.js";
import { IRunHistoryRepository } from "../domain/repositories/run-history.repository.js";
import { RemoteIndex } from "../domain/entities/remote-index.entity.js";
import { FileEntry } from "../domain/entities/library-item.entity.js";
import {
  SyncCounters,
  createSyncCounters,
} from "../domain/entities/counter-set.entity.js";
import {
  FileOutcomeListener,
  ItemProgressListener,
  SyncOptions,
  SyncResult,
} from "../domain/types.js";
import { BuildRemoteIndexUseCase } from "./build-remote-index.use-case.js";
import { walkLibrary } from "./library-walker.js";

export interface SyncLibraryRequest {
  runId: string;
  options: Readonly<SyncOptions>;
  pageSize: number;
  concurrency?: number;
  onProgress?: ItemProgressListener;
  onFileOutcome?: FileOutcomeListener;
  /** Called once the index is built, before any file is touched. */
  onIndexBuilt?: (index: RemoteIndex) => void;
}

/**
 * One-directional push: uploads every local library file that is not yet in
 * the bucket.
 */
export class SyncLibraryUseCase {
  constructor(
    private storage: IStorageService,
    private localFiles: ILocalFileService,
    private inventory: InventoryService,
    private buildIndex: BuildRemoteIndexUseCase,
    private prefix: string,
    private history?: IRunHistoryRepository,
  ) {}

  async execute(request: SyncLibraryRequest): Promise<SyncResult> {
    const startedAt = new Date().toISOString();
    const { options } = request;

    // Force never checks existence; without an index each key is probed.
    let index: RemoteIndex | null = null;
    if (!options.forceUpload && options.useIndex) {
      index = await this.buildIndex.execute(this.prefix);
      request.onIndexBuilt?.(index);
    }

    const counters = createSyncCounters();
    const totalItems = await this.inventory.countItems();

    await walkLibrary(
      this.inventory,
      totalItems,
      {
        pageSize: request.pageSize,
        concurrency: request.concurrency,
        onProgress: request.onProgress,
      },
      async (_id, files) => {
        for (const entry of files) {
          const outcome = await this.syncFile(entry, options, index, counters);
          request.onFileOutcome?.(entry, outcome);
        }
      },
    );

    if (this.history) {
      await this.history.append({
        runId: request.runId,
        command: "sync",
        startedAt,
        finishedAt: new Date().toISOString(),
        dryRun: options.dryRun,
        counters: counters.toRecord(),
      });
    }

    return {
      totalItems,
      indexSize: index ? index.size : null,
      counters,
    };
  }

  private async syncFile(
    entry: FileEntry,
    options: Readonly<SyncOptions>,
    index: RemoteIndex | null,
    counters: SyncCounters,
  ): Promise<string> {
    counters.increment("total_files_processed");

    if (!(await this.localFiles.exists(entry.localPath))) {
      counters.increment("files_local_not_found");
      return "local_not_found";
    }

    if (!options.forceUpload) {
      const exists = index
        ? index.has(entry.objectKey)
        : await this.storage.objectExists(entry.objectKey);
      if (exists) {
        counters.increment("files_skipped_exists");
        return "skipped_exists";
      }
    }

    if (options.dryRun) {
      counters.increment("files_uploaded");
      return "would_upload";
    }

    if (await this.storage.putObject(entry.localPath, entry.objectKey)) {
      counters.increment("files_uploaded");
      return "uploaded";
    }
    counters.increment("files_s3_errors");
    return "upload_failed";
  }
}
