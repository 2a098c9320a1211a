import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import { ILogger, LogEntry } from "../../core/domain/services/logger.service.js";

/**
 * Appends one JSON object per storage/disk operation to
 * <logDir>/<runLog without extension>_<runId>.jsonl.
 */
export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;
  private runId = "";
  private failure: Error | null = null;

  constructor(
    private logDir: string,
    private logNameTemplate: string,
  ) {}

  init(runId: string): void {
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    const filename =
      this.logNameTemplate.replace(/\.[^.]+$/, "") + `_${runId}.jsonl`;
    this.runId = runId;
    const stream = createWriteStream(join(this.logDir, filename), { flags: "a" });
    // An unwritable log stops logging; close() reports it.
    stream.on("error", (err) => {
      if (this.logStream !== stream) return;
      this.logStream = null;
      this.failure = err;
    });
    this.logStream = stream;
  }

  log(entry: LogEntry): void {
    if (this.logStream?.writable) {
      const full = {
        runId: this.runId,
        ...entry,
        timestamp: new Date().toISOString(),
      };
      this.logStream.write(JSON.stringify(full) + "\n");
    }
  }

  /** Resolves once buffered lines are flushed to disk; rejects if the log could not be written. */
  close(): Promise<void> {
    const stream = this.logStream;
    const failure = this.failure;
    this.logStream = null;
    this.failure = null;
    if (failure) return Promise.reject(failure);
    if (!stream) return Promise.resolve();
    return new Promise((resolve, reject) => {
      stream.once("error", reject);
      stream.end((err?: Error | null) => (err ? reject(err) : resolve()));
    });
  }
}
