import { ScanOrphansUseCase } from "../../../src/core/use-cases/scan-orphans.use-case.js";
import { RemoteIndex } from "../../../src/core/domain/entities/remote-index.entity.js";
import { InMemoryStorageService } from "../../mocks/in-memory-storage.service.js";

const KEYS = ["uploads/a.jpg", "uploads/b.jpg", "uploads/c.jpg", "uploads/d.jpg"];

function scan(
  storage: InMemoryStorageService,
  visited: string[],
  flags: { deleteOrphans?: boolean; dryRun?: boolean } = {},
) {
  return new ScanOrphansUseCase(storage).execute({
    index: new RemoteIndex("uploads/", KEYS),
    visitedKeys: new Set(visited),
    deleteOrphans: flags.deleteOrphans ?? false,
    dryRun: flags.dryRun ?? false,
  });
}

describe("ScanOrphansUseCase", () => {
  test("lists unvisited keys in listing order without deleting", async () => {
    const storage = new InMemoryStorageService(KEYS);
    const result = await scan(storage, ["uploads/b.jpg", "uploads/missing.jpg"]);

    expect(result).toEqual({
      objectsScanned: 4,
      orphans: ["uploads/a.jpg", "uploads/c.jpg", "uploads/d.jpg"],
      deleted: 0,
      deleteFailed: 0,
    });
    expect(storage.calls.delete).toEqual([]);
  });

  test("orphans and visited keys together cover the index", async () => {
    const visited = ["uploads/a.jpg", "uploads/d.jpg", "uploads/zzz.jpg"];
    const result = await scan(new InMemoryStorageService(KEYS), visited);
    const covered = new Set([...result.orphans, ...visited.filter((k) => KEYS.includes(k))]);
    expect([...covered].sort()).toEqual(KEYS);
  });

  test("deletes orphans and counts failures", async () => {
    const storage = new InMemoryStorageService(KEYS);
    storage.failDeleteKeys.add("uploads/c.jpg");
    const result = await scan(storage, ["uploads/a.jpg"], { deleteOrphans: true });

    expect(result.deleted).toBe(2);
    expect(result.deleteFailed).toBe(1);
    expect(storage.keys()).toEqual(["uploads/a.jpg", "uploads/c.jpg"]);
  });

  test("dry run counts deletions without calling storage", async () => {
    const storage = new InMemoryStorageService(KEYS);
    const result = await scan(storage, [], { deleteOrphans: true, dryRun: true });

    expect(result.deleted).toBe(4);
    expect(storage.calls.delete).toEqual([]);
    expect(storage.keys()).toEqual(KEYS);
  });
});
