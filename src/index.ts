#!/usr/bin/env node
/**
 * Media Offload Runner – CLI
 * Commands: sync | verify | info | history
 */

import { program } from "commander";
import { resolve } from "node:path";
import type Database from "better-sqlite3";
import {
  loadConfig,
  getConfigPath,
} from "./infrastructure/utils/config.utils.js";
import { runId as newRunId } from "./infrastructure/utils/id.utils.js";
import { Config } from "./core/domain/entities/config.entity.js";
import { openDatabase } from "./infrastructure/database/database.js";
import { SqliteLibraryRepository } from "./infrastructure/database/sqlite-library.repository.js";
import { SqliteRunHistoryRepository } from "./infrastructure/database/sqlite-run-history.repository.js";
import {
  AwsS3Service,
  missingStorageFields,
} from "./infrastructure/services/aws-s3.service.js";
import { NodeLocalFileService } from "./infrastructure/services/node-local-file.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import {
  RunReport,
  writeReports,
} from "./infrastructure/services/report-writer.service.js";
import { InventoryService } from "./core/domain/services/inventory.service.js";
import { BuildRemoteIndexUseCase } from "./core/use-cases/build-remote-index.use-case.js";
import { SyncLibraryUseCase } from "./core/use-cases/sync-library.use-case.js";
import { ReconcileLibraryUseCase } from "./core/use-cases/reconcile-library.use-case.js";
import { ScanOrphansUseCase } from "./core/use-cases/scan-orphans.use-case.js";
import { VerifyLibraryUseCase } from "./core/use-cases/verify-library.use-case.js";
import { SummaryView } from "./infrastructure/views/summary.view.js";
import { HistoryOptionsSchema } from "./adapters/validation.js";
import { publicUrl } from "./infrastructure/utils/storage.utils.js";
import { parsePositiveInt } from "./infrastructure/utils/cli.utils.js";
import type { FileOutcomeListener } from "./core/domain/types.js";

process.on("SIGTERM", () => process.exit(143));
process.on("SIGINT", () => process.exit(130));

const stdoutPiped = !process.stdout.isTTY;

// ─── Shared helpers ───────────────────────────────────────────────────────────

interface SyncCliOptions {
  dryRun?: boolean;
  force?: boolean;
  index: boolean;
  concurrency?: number;
  verbose?: boolean;
}

interface VerifyCliOptions {
  dryRun?: boolean;
  reuploadMissing?: boolean;
  deleteOrphans?: boolean;
  cleanupLocal?: boolean;
  concurrency?: number;
  verbose?: boolean;
}

interface RunContext {
  config: Config;
  runId: string;
  logger: JsonLogger;
  storage: AwsS3Service;
  inventory: InventoryService;
  buildIndex: BuildRemoteIndexUseCase;
  localFiles: NodeLocalFileService;
  history: SqliteRunHistoryRepository;
  close(): Promise<void>;
}

function openRun(config: Config): RunContext {
  const runId = newRunId();
  const logger = new JsonLogger(config.logging.dir, config.logging.runLog);
  // Built first so missing credentials fail before any file is opened.
  const storage = new AwsS3Service(config.storage, logger);
  logger.init(runId);

  const libraryDb = openDatabase(config.library.databasePath, {
    readonly: true,
  });
  const historyDb = openDatabase(config.run.historyPath);
  const inventory = new InventoryService(
    new SqliteLibraryRepository(libraryDb),
    resolve(config.library.uploadsDir),
    config.storage.prefix,
  );

  return {
    config,
    runId,
    logger,
    storage,
    inventory,
    buildIndex: new BuildRemoteIndexUseCase(storage),
    localFiles: new NodeLocalFileService(logger),
    history: new SqliteRunHistoryRepository(historyDb),
    async close() {
      closeQuietly(libraryDb);
      closeQuietly(historyDb);
      await logger.close();
    },
  };
}

function closeQuietly(db: Database.Database): void {
  if (db.open) db.close();
}

function progressReporter(label: string) {
  let last = -1;
  return (done: number, total: number) => {
    if (stdoutPiped) {
      process.stdout.write(`PROGRESS\t${done}\t${total}\n`);
      return;
    }
    const pct = total > 0 ? Math.floor((done / total) * 100) : 100;
    if (pct !== last) {
      last = pct;
      process.stdout.write(`\r${label}: ${pct}% (${done}/${total})`);
    }
    if (done === total) process.stdout.write("\n");
  };
}

function verboseOutcomes(enabled: boolean): FileOutcomeListener | undefined {
  if (!enabled) return undefined;
  return (entry, outcome) => {
    console.log(`  ${entry.objectKey}: ${outcome}`);
  };
}

function emitReport(config: Config, report: RunReport): void {
  const paths = writeReports(config.report, report);
  if (stdoutPiped) {
    process.stdout.write(`SUMMARY\t${JSON.stringify(report.counters)}\n`);
  }
  for (const path of paths) console.log(`Report written: ${path}`);
}

function fail(command: string, e: unknown): never {
  console.error(`${command} failed:`, e instanceof Error ? e.message : String(e));
  process.exit(1);
}

program
  .name("media-offload")
  .description("Offload a media library to S3-compatible object storage")
  .option("-c, --config <path>", "Config file path", getConfigPath());

// ─── sync ─────────────────────────────────────────────────────────────────────

program
  .command("sync")
  .description("Upload library files that are not yet in the bucket")
  .option("--dry-run", "Report what would be uploaded without uploading")
  .option("--force", "Upload every local file, even if it already exists remotely")
  .option("--no-index", "Check each key with HEAD instead of listing the bucket")
  .option("--concurrency <n>", "Attachments processed in parallel", parsePositiveInt)
  .option("-v, --verbose", "Print the outcome of every file")
  .action(async (opts: SyncCliOptions) => {
    let ctx: RunContext | null = null;
    try {
      const config = loadConfig(program.opts().config);
      ctx = openRun(config);
      const options = {
        dryRun: opts.dryRun === true,
        forceUpload: opts.force === true,
        useIndex: opts.index !== false,
      };
      if (stdoutPiped) process.stdout.write(`RUN_ID\t${ctx.runId}\n`);
      console.log(
        options.dryRun
          ? "Starting dry run synchronization..."
          : "Starting library synchronization...",
      );

      const useCase = new SyncLibraryUseCase(
        ctx.storage,
        ctx.localFiles,
        ctx.inventory,
        ctx.buildIndex,
        config.storage.prefix,
        ctx.history,
      );
      const startedAt = new Date().toISOString();
      const result = await useCase.execute({
        runId: ctx.runId,
        options,
        pageSize: config.run.pageSize,
        concurrency: opts.concurrency ?? config.run.concurrency,
        onIndexBuilt: (index) =>
          console.log(`Found ${index.size} existing object(s) under ${index.prefix}`),
        onProgress: progressReporter("Syncing"),
        onFileOutcome: verboseOutcomes(opts.verbose === true),
      });

      for (const line of SummaryView.sync(result, options.dryRun)) console.log(line);
      emitReport(config, {
        runId: ctx.runId,
        command: "sync",
        startedAt,
        finishedAt: new Date().toISOString(),
        options,
        totalItems: result.totalItems,
        counters: result.counters.toRecord(),
      });
      await ctx.close();
    } catch (e) {
      if (ctx) await ctx.close();
      fail("Sync", e);
    }
  });

// ─── verify ───────────────────────────────────────────────────────────────────

program
  .command("verify")
  .description("Compare the library with the bucket and optionally repair drift")
  .option("--dry-run", "Report corrective actions without performing them")
  .option("--reupload-missing", "Upload local files that are missing remotely")
  .option("--delete-orphans", "Delete remote objects no library item owns")
  .option("--cleanup-local", "Delete local copies of files that are stored remotely")
  .option("--concurrency <n>", "Attachments processed in parallel", parsePositiveInt)
  .option("-v, --verbose", "Print the classification of every file")
  .action(async (opts: VerifyCliOptions) => {
    let ctx: RunContext | null = null;
    try {
      const config = loadConfig(program.opts().config);
      ctx = openRun(config);
      const options = {
        dryRun: opts.dryRun === true,
        reuploadMissing: opts.reuploadMissing === true,
        deleteOrphans: opts.deleteOrphans === true,
        cleanupLocal: opts.cleanupLocal === true,
      };
      if (stdoutPiped) process.stdout.write(`RUN_ID\t${ctx.runId}\n`);
      console.log(
        options.dryRun
          ? "Starting dry run verification..."
          : "Starting verification...",
      );

      const useCase = new VerifyLibraryUseCase(
        ctx.inventory,
        ctx.buildIndex,
        new ReconcileLibraryUseCase(ctx.storage, ctx.localFiles, ctx.inventory),
        new ScanOrphansUseCase(ctx.storage),
        config.storage.prefix,
        ctx.history,
      );
      const startedAt = new Date().toISOString();
      const result = await useCase.execute({
        runId: ctx.runId,
        options,
        pageSize: config.run.pageSize,
        concurrency: opts.concurrency ?? config.run.concurrency,
        onIndexBuilt: (index) =>
          console.log(`Found ${index.size} object(s) under ${index.prefix}`),
        onProgress: progressReporter("Verifying"),
        onFileOutcome: verboseOutcomes(opts.verbose === true),
      });

      const lines = SummaryView.verify(result, {
        dryRun: options.dryRun,
        deleteOrphans: options.deleteOrphans,
        orphanListLimit: config.report.orphanListLimit,
      });
      for (const line of lines) console.log(line);
      emitReport(config, {
        runId: ctx.runId,
        command: "verify",
        startedAt,
        finishedAt: new Date().toISOString(),
        options,
        totalItems: result.totalItems,
        counters: result.counters.toRecord(),
        orphans: result.orphans,
      });
      await ctx.close();
    } catch (e) {
      if (ctx) await ctx.close();
      fail("Verify", e);
    }
  });

// ─── info ─────────────────────────────────────────────────────────────────────

program
  .command("info")
  .description("Show the storage configuration and test the connection")
  .action(async () => {
    try {
      const config = loadConfig(program.opts().config);
      const missing = missingStorageFields(config.storage);
      const test =
        missing.length === 0
          ? await new AwsS3Service(config.storage).testConnection()
          : null;
      const base = publicUrl(config.storage, "");
      for (const line of SummaryView.info(config, base, test)) console.log(line);
      for (const field of missing) console.log(`  missing: ${field}`);
      if (!test?.success) process.exit(1);
    } catch (e) {
      fail("Info", e);
    }
  });

// ─── history ──────────────────────────────────────────────────────────────────

program
  .command("history")
  .description("List the most recent sync and verify runs")
  .option("--limit <n>", "Number of runs to show", "10")
  .action(async (opts: { limit: string }) => {
    try {
      const config = loadConfig(program.opts().config);
      const { limit } = HistoryOptionsSchema.parse({ limit: opts.limit });
      const db = openDatabase(config.run.historyPath);
      try {
        const history = new SqliteRunHistoryRepository(db);
        const entries = await history.listRecent(limit);
        for (const line of SummaryView.history(entries)) console.log(line);
      } finally {
        db.close();
      }
    } catch (e) {
      fail("History", e);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => fail("Command", e));
