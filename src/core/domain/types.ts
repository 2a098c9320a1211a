/**
 * Shared types for media-offload-runner
 */

import type { SyncCounters, VerifyCounters } from "./entities/counter-set.entity.js";
import type { FileEntry } from "./entities/library-item.entity.js";

export interface SyncOptions {
  dryRun: boolean;
  /** Upload every present local file, even when the key already exists remotely. */
  forceUpload: boolean;
  /**
   * Build the remote index before walking. When false, existence is probed per key.
   * Ignored with forceUpload, which never checks existence.
   */
  useIndex: boolean;
}

export interface VerifyOptions {
  dryRun: boolean;
  reuploadMissing: boolean;
  deleteOrphans: boolean;
  cleanupLocal: boolean;
}

export type RunCommand = "sync" | "verify";

/** local exists × key in remote index */
export type Classification =
  | "remote_missing"
  | "both_present"
  | "offloaded_ok"
  | "both_missing";

export function classify(localExists: boolean, remoteExists: boolean): Classification {
  if (localExists) return remoteExists ? "both_present" : "remote_missing";
  return remoteExists ? "offloaded_ok" : "both_missing";
}

/** Observer called once per attachment after all of its files are handled. */
export type ItemProgressListener = (done: number, total: number) => void;

/** Observer called once per file with the outcome, for verbose output. */
export type FileOutcomeListener = (entry: FileEntry, outcome: string) => void;

export interface SyncResult {
  totalItems: number;
  /** Null when listing was skipped (force or per-key probes). */
  indexSize: number | null;
  counters: SyncCounters;
}

export interface ReconcileResult {
  counters: VerifyCounters;
  visitedKeys: ReadonlySet<string>;
}

export interface VerifyResult {
  totalItems: number;
  counters: VerifyCounters;
  orphans: string[];
}

export interface RunHistoryEntry {
  runId: string;
  command: RunCommand;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  counters: Record<string, number>;
}
