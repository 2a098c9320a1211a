import { InventoryService } from "../../src/core/domain/services/inventory.service.js";
import { BuildRemoteIndexUseCase } from "../../src/core/use-cases/build-remote-index.use-case.js";
import { LibraryItem } from "../../src/core/domain/entities/library-item.entity.js";
import { RunHistoryEntry } from "../../src/core/domain/types.js";
import { IRunHistoryRepository } from "../../src/core/domain/repositories/run-history.repository.js";
import { InMemoryLibraryRepository } from "./in-memory-library.repository.js";
import { InMemoryLocalFileService } from "./in-memory-local-file.service.js";
import { InMemoryStorageService } from "./in-memory-storage.service.js";

export const ROOT = "/srv/uploads";
export const PREFIX = "uploads/";

export const local = (relativePath: string) => `${ROOT}/${relativePath}`;
export const key = (relativePath: string) => `${PREFIX}${relativePath}`;

export class InMemoryRunHistory implements IRunHistoryRepository {
  readonly entries: RunHistoryEntry[] = [];

  async append(entry: RunHistoryEntry): Promise<void> {
    this.entries.push(entry);
  }

  async listRecent(limit: number): Promise<RunHistoryEntry[]> {
    return [...this.entries].reverse().slice(0, limit);
  }
}

export interface LibraryFixture {
  library: InMemoryLibraryRepository;
  localFiles: InMemoryLocalFileService;
  storage: InMemoryStorageService;
  inventory: InventoryService;
  buildIndex: BuildRemoteIndexUseCase;
  history: InMemoryRunHistory;
}

/**
 * Wires the in-memory collaborators. Paths are relative to the uploads dir;
 * remote entries are relative to the prefix.
 */
export function libraryFixture(setup: {
  items: LibraryItem[];
  localFiles?: string[];
  remoteFiles?: string[];
}): LibraryFixture {
  const library = new InMemoryLibraryRepository(setup.items);
  const localFiles = new InMemoryLocalFileService((setup.localFiles ?? []).map(local));
  const storage = new InMemoryStorageService((setup.remoteFiles ?? []).map(key));
  return {
    library,
    localFiles,
    storage,
    inventory: new InventoryService(library, ROOT, PREFIX),
    buildIndex: new BuildRemoteIndexUseCase(storage),
    history: new InMemoryRunHistory(),
  };
}
