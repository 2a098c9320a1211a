export const SYNC_COUNTERS = [
  "total_files_processed",
  "files_uploaded",
  "files_skipped_exists",
  "files_local_not_found",
  "files_s3_errors",
] as const;

export const VERIFY_COUNTERS = [
  "wp_attachments_scanned",
  "wp_files_scanned",
  "local_files_exist",
  "s3_missing",
  "local_and_s3_exist",
  "s3_exists_local_missing",
  "s3_reuploaded",
  "s3_reupload_failed",
  "local_cleaned",
  "local_cleanup_failed",
  "local_missing_s3_missing",
  "s3_objects_scanned",
  "s3_orphans_found",
  "s3_orphans_deleted",
  "s3_orphan_delete_failed",
] as const;

export type SyncCounter = (typeof SYNC_COUNTERS)[number];
export type VerifyCounter = (typeof VERIFY_COUNTERS)[number];

/**
 * Named, increment-only run counters. Every name starts at 0 so reports
 * always carry the full set.
 */
export class CounterSet<K extends string> {
  private readonly values = new Map<K, number>();

  constructor(readonly names: readonly K[]) {
    for (const name of names) this.values.set(name, 0);
  }

  increment(name: K, by = 1): void {
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(
        `Counter "${name}" can only grow by a non-negative integer, got ${by}`,
      );
    }
    this.values.set(name, (this.values.get(name) ?? 0) + by);
  }

  get(name: K): number {
    return this.values.get(name) ?? 0;
  }

  /** Flat name → value mapping handed to reporting. */
  toRecord(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const name of this.names) out[name] = this.get(name);
    return out;
  }
}

export type SyncCounters = CounterSet<SyncCounter>;
export type VerifyCounters = CounterSet<VerifyCounter>;

export function createSyncCounters(): SyncCounters {
  return new CounterSet(SYNC_COUNTERS);
}

export function createVerifyCounters(): VerifyCounters {
  return new CounterSet(VERIFY_COUNTERS);
}
