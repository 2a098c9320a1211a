export interface StorageConfig {
  bucket: string;
  /** Host name of the S3-compatible endpoint, without scheme (e.g. fsn1.your-objectstorage.com). */
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  /** Key namespace every managed object lives under. */
  prefix: string;
  /** Public base URL that replaces https://<bucket>.<endpoint> in generated URLs. */
  cdnUrl?: string;
  acl: "private" | "public-read";
  forcePathStyle: boolean;
  requestTimeoutMs: number;
}

export interface LibraryConfig {
  /** Local root every attachment path is relative to. */
  uploadsDir: string;
  /** SQLite database holding the attachments table. */
  databasePath: string;
}

export interface RunConfig {
  /** Attachments fetched per page while walking the library. */
  pageSize: number;
  /** Attachments processed in parallel within a page. 1 keeps strict ordering. */
  concurrency: number;
  historyPath: string;
}

export interface LoggingConfig {
  dir: string;
  runLog: string;
}

export type ReportFormat = "json" | "markdown";

export interface ReportConfig {
  outputDir: string;
  formats: ReportFormat[];
  /** Keep only this many report sets. 0 keeps all. */
  retainCount: number;
  /** Orphan keys listed in summaries before truncating with "...and N more." */
  orphanListLimit: number;
}

export interface Config {
  storage: StorageConfig;
  library: LibraryConfig;
  run: RunConfig;
  logging: LoggingConfig;
  report: ReportConfig;
}
