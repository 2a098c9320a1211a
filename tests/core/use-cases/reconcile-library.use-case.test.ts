import { ReconcileLibraryUseCase } from "../../../src/core/use-cases/reconcile-library.use-case.js";
import { RemoteIndex } from "../../../src/core/domain/entities/remote-index.entity.js";
import { VerifyOptions } from "../../../src/core/domain/types.js";
import { item } from "../../mocks/in-memory-library.repository.js";
import {
  LibraryFixture,
  PREFIX,
  key,
  libraryFixture,
  local,
} from "../../mocks/library-fixture.js";

const NO_REPAIRS: VerifyOptions = {
  dryRun: false,
  reuploadMissing: false,
  deleteOrphans: false,
  cleanupLocal: false,
};

async function reconcile(f: LibraryFixture, options: Partial<VerifyOptions> = {}) {
  const index = await f.buildIndex.execute(PREFIX);
  const outcomes: string[] = [];
  const result = await new ReconcileLibraryUseCase(f.storage, f.localFiles, f.inventory).execute({
    index,
    options: { ...NO_REPAIRS, ...options },
    totalItems: await f.inventory.countItems(),
    pageSize: 100,
    onFileOutcome: (entry, outcome) => outcomes.push(`${entry.relativePath}=${outcome}`),
  });
  return { ...result, outcomes };
}

/** One file in each of the four classifications. */
function fourWayLibrary() {
  return libraryFixture({
    items: [
      item(1, "both.jpg"),
      item(2, "local-only.jpg"),
      item(3, "remote-only.jpg"),
      item(4, "neither.jpg"),
    ],
    localFiles: ["both.jpg", "local-only.jpg"],
    remoteFiles: ["both.jpg", "remote-only.jpg"],
  });
}

/** A: a.jpg on both sides, a-thumb.jpg only local. B: b.jpg only remote. */
function offloadScenario() {
  return libraryFixture({
    items: [item(1, "a.jpg", { thumbnail: "a-thumb.jpg" }), item(2, "b.jpg")],
    localFiles: ["a.jpg", "a-thumb.jpg"],
    remoteFiles: ["a.jpg", "b.jpg"],
  });
}

describe("ReconcileLibraryUseCase", () => {
  test("classifies each file into exactly one of four outcomes", async () => {
    const { counters, outcomes } = await reconcile(fourWayLibrary());

    expect(outcomes).toEqual([
      "both.jpg=both_present",
      "local-only.jpg=remote_missing",
      "remote-only.jpg=offloaded_ok",
      "neither.jpg=both_missing",
    ]);
    expect(counters.get("wp_attachments_scanned")).toBe(4);
    expect(counters.get("wp_files_scanned")).toBe(4);
    expect(counters.get("local_files_exist")).toBe(2);
    expect(counters.get("s3_missing")).toBe(1);
    expect(counters.get("local_and_s3_exist")).toBe(1);
    expect(counters.get("s3_exists_local_missing")).toBe(1);
    expect(counters.get("local_missing_s3_missing")).toBe(1);
  });

  test("classification counters sum to the files scanned", async () => {
    const { counters } = await reconcile(offloadScenario(), { reuploadMissing: true });
    const classified =
      counters.get("s3_missing") +
      counters.get("local_and_s3_exist") +
      counters.get("s3_exists_local_missing") +
      counters.get("local_missing_s3_missing");
    expect(classified).toBe(counters.get("wp_files_scanned"));
  });

  test("offload scenario in dry run with re-upload", async () => {
    const f = offloadScenario();
    const { counters, visitedKeys } = await reconcile(f, {
      dryRun: true,
      reuploadMissing: true,
    });

    expect(counters.get("wp_attachments_scanned")).toBe(2);
    expect(counters.get("wp_files_scanned")).toBe(3);
    expect(counters.get("s3_missing")).toBe(1);
    expect(counters.get("s3_reuploaded")).toBe(1);
    expect(counters.get("s3_exists_local_missing")).toBe(1);
    expect(counters.get("local_missing_s3_missing")).toBe(0);
    expect(f.storage.calls.put).toEqual([]);
    expect([...visitedKeys]).toEqual([key("a.jpg"), key("a-thumb.jpg"), key("b.jpg")]);
  });

  test("re-uploads missing files for real", async () => {
    const f = offloadScenario();
    const { counters, outcomes } = await reconcile(f, { reuploadMissing: true });

    expect(f.storage.calls.put).toEqual([key("a-thumb.jpg")]);
    expect(counters.get("s3_reuploaded")).toBe(1);
    expect(outcomes).toContain("a-thumb.jpg=remote_missing:reuploaded");
  });

  test("counts a failed re-upload and skips its cleanup", async () => {
    const f = offloadScenario();
    f.storage.failPutKeys.add(key("a-thumb.jpg"));
    const { counters, outcomes } = await reconcile(f, {
      reuploadMissing: true,
      cleanupLocal: true,
    });

    expect(counters.get("s3_reupload_failed")).toBe(1);
    expect(counters.get("s3_reuploaded")).toBe(0);
    expect(counters.get("local_cleaned")).toBe(0);
    expect(f.localFiles.files.has(local("a-thumb.jpg"))).toBe(true);
    expect(outcomes).toContain("a-thumb.jpg=remote_missing:reupload_failed");
  });

  test("cleans up after a successful re-upload", async () => {
    const f = offloadScenario();
    const { counters, outcomes } = await reconcile(f, {
      reuploadMissing: true,
      cleanupLocal: true,
    });

    expect(counters.get("s3_reuploaded")).toBe(1);
    expect(counters.get("local_cleaned")).toBe(1);
    expect(f.localFiles.removed).toEqual([local("a-thumb.jpg")]);
    expect(outcomes).toContain("a-thumb.jpg=remote_missing:reuploaded,cleaned");
    // a.jpg is on both sides, but cleanup of present files is off while re-uploading.
    expect(outcomes).toContain("a.jpg=both_present");
  });

  test("cleans local copies of stored files when only cleanup is requested", async () => {
    const f = offloadScenario();
    const { counters } = await reconcile(f, { cleanupLocal: true });

    expect(f.localFiles.removed).toEqual([local("a.jpg")]);
    expect(counters.get("local_cleaned")).toBe(1);
    expect(counters.get("s3_reuploaded")).toBe(0);
  });

  test("counts a failed cleanup", async () => {
    const f = offloadScenario();
    f.localFiles.failRemovePaths.add(local("a.jpg"));
    const { counters } = await reconcile(f, { cleanupLocal: true });

    expect(counters.get("local_cleanup_failed")).toBe(1);
    expect(counters.get("local_cleaned")).toBe(0);
  });

  test("dry run reports the counters of a fully successful run", async () => {
    const options = { reuploadMissing: true, cleanupLocal: true };
    const preview = await reconcile(offloadScenario(), { ...options, dryRun: true });
    const real = await reconcile(offloadScenario(), options);

    expect(preview.counters.toRecord()).toEqual(real.counters.toRecord());
  });

  test("dry run leaves disk and bucket untouched", async () => {
    const f = offloadScenario();
    await reconcile(f, { dryRun: true, reuploadMissing: true, cleanupLocal: true });

    expect(f.storage.calls.put).toEqual([]);
    expect(f.localFiles.removed).toEqual([]);
  });

  test("never remediates files missing on both sides", async () => {
    const f = libraryFixture({ items: [item(1, "gone.jpg")] });
    const { counters } = await reconcile(f, {
      reuploadMissing: true,
      cleanupLocal: true,
      deleteOrphans: true,
    });

    expect(counters.get("local_missing_s3_missing")).toBe(1);
    expect(f.storage.calls.put).toEqual([]);
    expect(f.storage.calls.delete).toEqual([]);
  });

  test("uses the index it was given, not a fresh listing", async () => {
    const f = offloadScenario();
    const stale = new RemoteIndex(PREFIX, []);
    const result = await new ReconcileLibraryUseCase(f.storage, f.localFiles, f.inventory).execute({
      index: stale,
      options: NO_REPAIRS,
      totalItems: 2,
      pageSize: 100,
    });

    expect(result.counters.get("s3_missing")).toBe(2);
    expect(result.counters.get("local_missing_s3_missing")).toBe(1);
    expect(f.storage.calls.exists).toEqual([]);
  });
});
