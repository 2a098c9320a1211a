import { InventoryService } from "../domain/services/inventory.service.js";
import { IRunHistoryRepository } from "../domain/repositories/run-history.repository.js";
import { RemoteIndex } from "../domain/entities/remote-index.entity.js";
import {
  FileOutcomeListener,
  ItemProgressListener,
  VerifyOptions,
  VerifyResult,
} from "../domain/types.js";
import { BuildRemoteIndexUseCase } from "./build-remote-index.use-case.js";
import { ReconcileLibraryUseCase } from "./reconcile-library.use-case.js";
import { ScanOrphansUseCase } from "./scan-orphans.use-case.js";

export interface VerifyLibraryRequest {
  runId: string;
  options: Readonly<VerifyOptions>;
  pageSize: number;
  concurrency?: number;
  onIndexBuilt?: (index: RemoteIndex) => void;
  /** Phase 1 progress, once per library item. */
  onProgress?: ItemProgressListener;
  onFileOutcome?: FileOutcomeListener;
}

/**
 * Full verification run: index the bucket, reconcile every library file
 * against it (phase 1), then look for orphans (phase 2).
 */
export class VerifyLibraryUseCase {
  constructor(
    private inventory: InventoryService,
    private buildIndex: BuildRemoteIndexUseCase,
    private reconcile: ReconcileLibraryUseCase,
    private scanOrphans: ScanOrphansUseCase,
    private prefix: string,
    private history?: IRunHistoryRepository,
  ) {}

  async execute(request: VerifyLibraryRequest): Promise<VerifyResult> {
    const startedAt = new Date().toISOString();
    const { options } = request;

    // Without a complete index nothing can be classified; abort before touching files.
    const index = await this.buildIndex.execute(this.prefix);
    request.onIndexBuilt?.(index);

    const totalItems = await this.inventory.countItems();
    const { counters, visitedKeys } = await this.reconcile.execute({
      index,
      options,
      totalItems,
      pageSize: request.pageSize,
      concurrency: request.concurrency,
      onProgress: request.onProgress,
      onFileOutcome: request.onFileOutcome,
    });

    const scan = await this.scanOrphans.execute({
      index,
      visitedKeys,
      deleteOrphans: options.deleteOrphans,
      dryRun: options.dryRun,
    });
    counters.increment("s3_objects_scanned", scan.objectsScanned);
    counters.increment("s3_orphans_found", scan.orphans.length);
    counters.increment("s3_orphans_deleted", scan.deleted);
    counters.increment("s3_orphan_delete_failed", scan.deleteFailed);

    if (this.history) {
      await this.history.append({
        runId: request.runId,
        command: "verify",
        startedAt,
        finishedAt: new Date().toISOString(),
        dryRun: options.dryRun,
        counters: counters.toRecord(),
      });
    }

    return { totalItems, counters, orphans: scan.orphans };
  }
}
