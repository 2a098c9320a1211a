export type OperationName = "put" | "delete" | "exists" | "list" | "unlink";

/** One storage or disk operation. The logger stamps the run id and time. */
export interface LogEntry {
  operation: OperationName;
  /** Object key, or prefix for list operations. */
  target: string;
  localPath?: string;
  success: boolean;
  latencyMs: number;
  /** Extra result detail, e.g. `exists: true` or the number of listed keys. */
  detail?: Record<string, string | number | boolean>;
  error?: string;
}

export interface ILogger {
  init(runId: string): void;
  log(entry: LogEntry): void;
  close(): void | Promise<void>;
}
