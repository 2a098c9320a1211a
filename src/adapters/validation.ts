import { z } from "zod";
import type { Config } from "../core/domain/entities/config.entity.js";

/**
 * Validation schemas for the YAML config and CLI options.
 * Defaults live here so the rest of the code sees a complete Config.
 */

export const StorageConfigSchema = z.object({
  bucket: z.string().default(""),
  endpoint: z
    .string()
    .default("")
    .transform((v) => v.replace(/^https?:\/\//, "").replace(/\/+$/, "")),
  region: z.string().min(1).default("eu-central-1"),
  accessKeyId: z.string().default(""),
  secretAccessKey: z.string().default(""),
  prefix: z
    .string()
    .min(1, "prefix must not be empty")
    .default("uploads/")
    .transform((v) => (v.endsWith("/") ? v : `${v}/`)),
  cdnUrl: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined)),
  acl: z.enum(["private", "public-read"]).default("public-read"),
  forcePathStyle: z.boolean().default(true),
  requestTimeoutMs: z.number().int().positive().default(30000),
});

export const ConfigSchema: z.ZodType<Config, z.ZodTypeDef, unknown> = z.object({
  storage: StorageConfigSchema,
  library: z.object({
    uploadsDir: z.string().min(1, "uploadsDir is required"),
    databasePath: z.string().min(1, "databasePath is required"),
  }),
  run: z
    .object({
      pageSize: z.number().int().min(1).default(100),
      concurrency: z.number().int().min(1).default(1),
      historyPath: z.string().min(1).default("./output/history.sqlite"),
    })
    .default({}),
  logging: z
    .object({
      dir: z.string().min(1).default("./output/logs"),
      runLog: z.string().min(1).default("offload_operations.jsonl"),
    })
    .default({}),
  report: z
    .object({
      outputDir: z.string().min(1).default("./output/reports"),
      formats: z
        .array(z.enum(["json", "markdown"]))
        .min(1, "at least one report format is required")
        .default(["json"]),
      retainCount: z.number().int().min(0).default(0),
      orphanListLimit: z.number().int().min(0).default(20),
    })
    .default({}),
});

export const HistoryOptionsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(10),
});
