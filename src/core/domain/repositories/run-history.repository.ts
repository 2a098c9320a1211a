import { RunHistoryEntry } from "../types.js";
export type { RunHistoryEntry } from "../types.js";

export interface IRunHistoryRepository {
  append(entry: RunHistoryEntry): Promise<void>;
  /** Most recent first. */
  listRecent(limit: number): Promise<RunHistoryEntry[]>;
}
