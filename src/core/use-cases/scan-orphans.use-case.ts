import { IStorageService } from "../domain/services/storage.service.js";
import { RemoteIndex } from "../domain/entities/remote-index.entity.js";

export interface ScanOrphansRequest {
  index: RemoteIndex;
  /** Keys of every file the reconciliation walk saw. */
  visitedKeys: ReadonlySet<string>;
  deleteOrphans: boolean;
  dryRun: boolean;
}

export interface OrphanScanResult {
  objectsScanned: number;
  /** Remote keys with no library file, in listing order. */
  orphans: string[];
  deleted: number;
  deleteFailed: number;
}

/**
 * Finds keys in the remote index that no library file maps to. Only meaningful
 * after a reconciliation walk has filled `visitedKeys`.
 */
export class ScanOrphansUseCase {
  constructor(private storage: IStorageService) {}

  async execute(request: ScanOrphansRequest): Promise<OrphanScanResult> {
    const orphans = request.index
      .values()
      .filter((key) => !request.visitedKeys.has(key));

    let deleted = 0;
    let deleteFailed = 0;
    if (request.deleteOrphans) {
      for (const key of orphans) {
        if (request.dryRun || (await this.storage.deleteObject(key))) {
          deleted++;
        } else {
          deleteFailed++;
        }
      }
    }

    return {
      objectsScanned: request.index.size,
      orphans,
      deleted,
      deleteFailed,
    };
  }
}
