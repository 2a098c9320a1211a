import {
  DeleteObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { once } from "node:events";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import {
  ConnectionTestResult,
  IStorageService,
} from "../../core/domain/services/storage.service.js";
import { ILogger, LogEntry } from "../../core/domain/services/logger.service.js";
import { StorageConfig } from "../../core/domain/entities/config.entity.js";
import { ConfigurationError, RemoteListError } from "../../core/domain/errors.js";
import {
  contentTypeFor,
  describeStorageError,
  friendlyStorageError,
  isNotFoundError,
  publicUrl,
} from "../utils/storage.utils.js";

/** Fields that must be set before a client can be built. */
export function missingStorageFields(config: StorageConfig): string[] {
  const missing: string[] = [];
  if (!config.bucket) missing.push("storage.bucket (STORAGE_BUCKET)");
  if (!config.endpoint) missing.push("storage.endpoint (STORAGE_ENDPOINT)");
  if (!config.accessKeyId) missing.push("storage.accessKeyId (STORAGE_ACCESS_KEY)");
  if (!config.secretAccessKey) missing.push("storage.secretAccessKey (STORAGE_SECRET_KEY)");
  return missing;
}

export class AwsS3Service implements IStorageService {
  private s3Client: S3Client;

  constructor(
    private config: StorageConfig,
    private logger?: ILogger,
  ) {
    const missing = missingStorageFields(config);
    if (missing.length > 0) {
      throw new ConfigurationError("Storage is not configured", missing);
    }
    this.s3Client = new S3Client({
      region: config.region,
      endpoint: `https://${config.endpoint}`,
      forcePathStyle: config.forcePathStyle,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
      requestHandler: {
        requestTimeout: config.requestTimeoutMs,
        connectionTimeout: config.requestTimeoutMs,
      },
    });
  }

  async putObject(localPath: string, key: string): Promise<boolean> {
    const started = Date.now();
    try {
      const { size } = await stat(localPath);
      const body = createReadStream(localPath);
      // A read error (file removed after stat) fails this upload only.
      const bodyFailed = once(body, "error").then(([err]: unknown[]) => {
        throw err;
      });
      try {
        await Promise.race([
          this.s3Client.send(
            new PutObjectCommand({
              Bucket: this.config.bucket,
              Key: key,
              Body: body,
              ContentLength: size,
              ContentType: contentTypeFor(localPath),
              ACL: this.config.acl,
            }),
          ),
          bodyFailed,
        ]);
      } finally {
        body.destroy();
      }
      this.record({ operation: "put", target: key, localPath, success: true }, started);
      return true;
    } catch (e) {
      this.record(
        { operation: "put", target: key, localPath, success: false, error: describeStorageError(e).message },
        started,
      );
      console.error(`Failed to upload ${localPath} to s3://${this.config.bucket}/${key}:`, describeStorageError(e).message);
      return false;
    }
  }

  async deleteObject(key: string): Promise<boolean> {
    const started = Date.now();
    try {
      await this.s3Client.send(
        new DeleteObjectCommand({ Bucket: this.config.bucket, Key: key }),
      );
      this.record({ operation: "delete", target: key, success: true }, started);
      return true;
    } catch (e) {
      if (isNotFoundError(e)) {
        this.record({ operation: "delete", target: key, success: true, detail: { absent: true } }, started);
        return true;
      }
      this.record(
        { operation: "delete", target: key, success: false, error: describeStorageError(e).message },
        started,
      );
      console.error(`Failed to delete s3://${this.config.bucket}/${key}:`, describeStorageError(e).message);
      return false;
    }
  }

  async objectExists(key: string): Promise<boolean> {
    const started = Date.now();
    try {
      await this.s3Client.send(
        new HeadObjectCommand({ Bucket: this.config.bucket, Key: key }),
      );
      this.record({ operation: "exists", target: key, success: true, detail: { exists: true } }, started);
      return true;
    } catch (e) {
      if (isNotFoundError(e)) {
        this.record({ operation: "exists", target: key, success: true, detail: { exists: false } }, started);
        return false;
      }
      // Unknown state is treated as absent so the file gets uploaded.
      this.record(
        { operation: "exists", target: key, success: false, error: describeStorageError(e).message },
        started,
      );
      return false;
    }
  }

  async listKeys(prefix: string): Promise<string[]> {
    const started = Date.now();
    const keys: string[] = [];
    let continuationToken: string | undefined;
    try {
      do {
        const cmd = new ListObjectsV2Command({
          Bucket: this.config.bucket,
          Prefix: prefix || undefined,
          ContinuationToken: continuationToken,
        });
        const out = await this.s3Client.send(cmd);
        for (const obj of out.Contents ?? []) {
          if (obj.Key) keys.push(obj.Key);
        }
        continuationToken = out.NextContinuationToken;
      } while (continuationToken);
    } catch (e) {
      this.record(
        { operation: "list", target: prefix, success: false, error: describeStorageError(e).message },
        started,
      );
      throw new RemoteListError(prefix, e);
    }
    this.record({ operation: "list", target: prefix, success: true, detail: { keys: keys.length } }, started);
    return keys;
  }

  urlFor(relativeKey: string): string {
    return publicUrl(this.config, relativeKey);
  }

  async testConnection(): Promise<ConnectionTestResult> {
    const started = Date.now();
    try {
      const out = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: this.config.bucket,
          Prefix: this.config.prefix,
          MaxKeys: 10,
        }),
      );
      return {
        success: true,
        objectCount: out.KeyCount ?? out.Contents?.length ?? 0,
        durationMs: Date.now() - started,
      };
    } catch (e) {
      const info = describeStorageError(e);
      return {
        success: false,
        durationMs: Date.now() - started,
        error: friendlyStorageError(info.code, info.statusCode),
        errorCode: info.code,
        errorDetail: info.message,
      };
    }
  }

  private record(entry: Omit<LogEntry, "latencyMs">, started: number): void {
    this.logger?.log({ ...entry, latencyMs: Date.now() - started });
  }
}
