import type {
  RunHistoryEntry,
  SyncResult,
  VerifyResult,
} from "../../core/domain/types.js";
import type { ConnectionTestResult } from "../../core/domain/services/storage.service.js";
import type { Config } from "../../core/domain/entities/config.entity.js";

const RULE = "---------------------------------------------------";

/**
 * Plain-text renderings of run results. Each method returns lines so the CLI
 * decides where they go.
 */
export class SummaryView {
  static sync(result: SyncResult, dryRun: boolean): string[] {
    const c = result.counters;
    const lines = [
      RULE,
      "Synchronization Summary:",
      RULE,
      `Total attachments scanned: ${result.totalItems}`,
      `Total file operations attempted: ${c.get("total_files_processed")}`,
      dryRun
        ? `Files that would be uploaded: ${c.get("files_uploaded")}`
        : `Files successfully uploaded: ${c.get("files_uploaded")}`,
      `Files skipped (already exist on storage): ${c.get("files_skipped_exists")}`,
      `Local files not found: ${c.get("files_local_not_found")}`,
      `Upload errors: ${c.get("files_s3_errors")}`,
      RULE,
    ];
    lines.push(
      dryRun
        ? "Dry run synchronization process completed."
        : "Library synchronization process completed.",
    );
    return lines;
  }

  static verify(
    result: VerifyResult,
    options: { dryRun: boolean; deleteOrphans: boolean; orphanListLimit: number },
  ): string[] {
    const c = result.counters;
    const lines = [
      RULE,
      "Verification Summary:",
      RULE,
      `Attachments scanned: ${c.get("wp_attachments_scanned")}`,
      `Files (versions/thumbnails) scanned: ${c.get("wp_files_scanned")}`,
      `Local files currently on disk: ${c.get("local_files_exist")}`,
      `Files missing on storage (but present locally): ${c.get("s3_missing")}`,
      `Files present locally and on storage: ${c.get("local_and_s3_exist")}`,
      `Files re-uploaded to storage: ${c.get("s3_reuploaded")}`,
      `Failed re-uploads: ${c.get("s3_reupload_failed")}`,
      `Local files cleaned up (because on storage): ${c.get("local_cleaned")}`,
      `Failed local cleanups: ${c.get("local_cleanup_failed")}`,
      `Files offloaded (local missing, storage exists): ${c.get("s3_exists_local_missing")}`,
      `Problematic (both local & storage missing): ${c.get("local_missing_s3_missing")}`,
      RULE,
      `Storage objects scanned: ${c.get("s3_objects_scanned")}`,
      `Orphan objects found: ${c.get("s3_orphans_found")}`,
      `Orphan objects deleted: ${c.get("s3_orphans_deleted")}`,
      `Failed orphan deletes: ${c.get("s3_orphan_delete_failed")}`,
      RULE,
    ];
    if (!options.deleteOrphans && result.orphans.length > 0) {
      lines.push(...SummaryView.orphanList(result.orphans, options.orphanListLimit));
    }
    lines.push(
      options.dryRun
        ? "Dry run verification process completed."
        : "Verification process completed.",
    );
    return lines;
  }

  static orphanList(orphans: readonly string[], limit: number): string[] {
    const lines = [
      `To delete them, run again with --delete-orphans. Listing first ${limit} (at most) orphan keys:`,
    ];
    for (const key of orphans.slice(0, limit)) lines.push(`- ${key}`);
    if (orphans.length > limit) {
      lines.push(`...and ${orphans.length - limit} more.`);
    }
    return lines;
  }

  static info(
    config: Config,
    publicUrlBase: string,
    test: ConnectionTestResult | null,
  ): string[] {
    const s = config.storage;
    const credentials = s.accessKeyId && s.secretAccessKey ? "yes" : "no";
    const lines = [
      `Bucket: ${s.bucket || "(not set)"}`,
      `Endpoint: ${s.endpoint || "(not set)"}`,
      `Region: ${s.region}`,
      `Prefix: ${s.prefix}`,
      `Public URL base: ${publicUrlBase}`,
      `Credentials configured: ${credentials}`,
      `Uploads directory: ${config.library.uploadsDir}`,
      `Library database: ${config.library.databasePath}`,
    ];
    if (!test) {
      lines.push("Connection not tested: storage is not fully configured.");
    } else if (test.success) {
      lines.push(
        `Connection OK in ${test.durationMs} ms (${test.objectCount ?? 0} object(s) listed under ${s.prefix})`,
      );
    } else {
      lines.push(
        `Connection failed after ${test.durationMs} ms: ${test.error ?? "Unknown error"}`,
      );
      if (test.errorDetail) lines.push(`  ${test.errorDetail}`);
    }
    return lines;
  }

  static history(entries: readonly RunHistoryEntry[]): string[] {
    if (entries.length === 0) return ["No runs recorded yet."];
    return entries.map((e) => {
      const counters = Object.entries(e.counters)
        .filter(([, value]) => value > 0)
        .map(([name, value]) => `${name}=${value}`)
        .join(" ");
      const mode = e.dryRun ? " (dry run)" : "";
      return `${e.startedAt}  ${e.command}${mode}  ${e.runId}  ${counters || "no activity"}`;
    });
  }
}
