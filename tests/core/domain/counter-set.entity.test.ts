import {
  CounterSet,
  SYNC_COUNTERS,
  VERIFY_COUNTERS,
  createSyncCounters,
  createVerifyCounters,
} from "../../../src/core/domain/entities/counter-set.entity.js";

describe("CounterSet", () => {
  test("starts every named counter at zero", () => {
    const counters = createSyncCounters();
    expect(counters.toRecord()).toEqual({
      total_files_processed: 0,
      files_uploaded: 0,
      files_skipped_exists: 0,
      files_local_not_found: 0,
      files_s3_errors: 0,
    });
  });

  test("increments by one or by a given amount", () => {
    const counters = new CounterSet(["a", "b"] as const);
    counters.increment("a");
    counters.increment("a");
    counters.increment("b", 5);
    expect(counters.get("a")).toBe(2);
    expect(counters.get("b")).toBe(5);
  });

  test("incrementing by zero leaves the value unchanged", () => {
    const counters = createVerifyCounters();
    counters.increment("s3_orphans_found", 0);
    expect(counters.get("s3_orphans_found")).toBe(0);
  });

  test("rejects negative and fractional increments", () => {
    const counters = createVerifyCounters();
    expect(() => counters.increment("s3_missing", -1)).toThrow(RangeError);
    expect(() => counters.increment("s3_missing", 1.5)).toThrow(RangeError);
    expect(counters.get("s3_missing")).toBe(0);
  });

  test("toRecord keeps declaration order", () => {
    expect(Object.keys(createVerifyCounters().toRecord())).toEqual([...VERIFY_COUNTERS]);
    expect(Object.keys(createSyncCounters().toRecord())).toEqual([...SYNC_COUNTERS]);
  });

  test("toRecord is a copy", () => {
    const counters = createSyncCounters();
    const record = counters.toRecord();
    record.files_uploaded = 99;
    expect(counters.get("files_uploaded")).toBe(0);
  });
});
