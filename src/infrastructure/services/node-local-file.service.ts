import { access, unlink } from "node:fs/promises";
import { ILocalFileService } from "../../core/domain/services/local-file.service.js";
import { ILogger } from "../../core/domain/services/logger.service.js";

export class NodeLocalFileService implements ILocalFileService {
  constructor(private logger?: ILogger) {}

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async remove(path: string): Promise<boolean> {
    const started = Date.now();
    try {
      await unlink(path);
      this.logger?.log({
        operation: "unlink",
        target: path,
        localPath: path,
        success: true,
        latencyMs: Date.now() - started,
      });
      return true;
    } catch (e) {
      const error = e instanceof Error ? e.message : String(e);
      this.logger?.log({
        operation: "unlink",
        target: path,
        localPath: path,
        success: false,
        latencyMs: Date.now() - started,
        error,
      });
      console.error(`Failed to delete local file ${path}:`, error);
      return false;
    }
  }
}
