import { extname } from "node:path";
import type { StorageConfig } from "../../core/domain/entities/config.entity.js";

const CONTENT_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".avif": "image/avif",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
  ".pdf": "application/pdf",
  ".mp4": "video/mp4",
  ".webm": "video/webm",
  ".mp3": "audio/mpeg",
  ".txt": "text/plain",
};

/** Content-Type sent with uploads so public URLs render in the browser. */
export function contentTypeFor(path: string): string {
  return CONTENT_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}

export function normalizeRelativePath(p: string): string {
  if (!p) return "";
  return p.replace(/\\/g, "/").replace(/^\/+/, "").replace(/\/+$/, "");
}

export interface StorageErrorInfo {
  code?: string;
  statusCode?: number;
  message: string;
}

/** Pulls the S3 error code and HTTP status out of an SDK error. */
export function describeStorageError(e: unknown): StorageErrorInfo {
  const message = e instanceof Error ? e.message : String(e);
  if (typeof e !== "object" || e === null) return { message };

  const code = "name" in e && typeof e.name === "string" ? e.name : undefined;
  let statusCode: number | undefined;
  if ("$metadata" in e && typeof e.$metadata === "object" && e.$metadata !== null) {
    const meta = e.$metadata;
    if ("httpStatusCode" in meta && typeof meta.httpStatusCode === "number") {
      statusCode = meta.httpStatusCode;
    }
  }
  return { code, statusCode, message };
}

export function isNotFoundError(e: unknown): boolean {
  const { code, statusCode } = describeStorageError(e);
  return code === "NotFound" || code === "NoSuchKey" || statusCode === 404;
}

const FRIENDLY_MESSAGES: Record<string, string> = {
  AccessDenied: "Access denied - check your credentials and bucket permissions",
  NoSuchBucket: "Bucket not found - verify the bucket name exists",
  InvalidAccessKeyId: "Invalid access key - check STORAGE_ACCESS_KEY",
  SignatureDoesNotMatch: "Invalid secret key - check STORAGE_SECRET_KEY",
  PermanentRedirect: "Wrong endpoint - check the STORAGE_ENDPOINT region",
  RequestTimeout: "Connection timeout - check your network connection",
};

export function friendlyStorageError(code: string | undefined, statusCode: number | undefined): string {
  if (code && FRIENDLY_MESSAGES[code]) return FRIENDLY_MESSAGES[code];
  return `${code || "Unknown error"} (HTTP ${statusCode ?? 0})`;
}

/** `cdnUrl` when set, else the virtual-hosted bucket URL, then the prefixed key. */
export function publicUrl(
  config: Pick<StorageConfig, "bucket" | "endpoint" | "prefix" | "cdnUrl">,
  relativeKey: string,
): string {
  const base = config.cdnUrl
    ? config.cdnUrl.replace(/\/+$/, "")
    : `https://${config.bucket}.${config.endpoint}`;
  return `${base}/${config.prefix}${relativeKey.replace(/^\/+/, "")}`;
}
