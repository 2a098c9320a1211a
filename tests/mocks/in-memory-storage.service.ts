import {
  ConnectionTestResult,
  IStorageService,
} from "../../src/core/domain/services/storage.service.js";
import { RemoteListError } from "../../src/core/domain/errors.js";

/**
 * Bucket held in a Map. Failures are injected per key or per operation.
 */
export class InMemoryStorageService implements IStorageService {
  readonly objects = new Map<string, string>();
  readonly failPutKeys = new Set<string>();
  readonly failDeleteKeys = new Set<string>();
  listError: Error | null = null;

  readonly calls: { put: string[]; delete: string[]; exists: string[]; list: number } = {
    put: [],
    delete: [],
    exists: [],
    list: 0,
  };

  constructor(keys: Iterable<string> = []) {
    for (const key of keys) this.objects.set(key, "remote");
  }

  async putObject(localPath: string, key: string): Promise<boolean> {
    this.calls.put.push(key);
    if (this.failPutKeys.has(key)) return false;
    this.objects.set(key, localPath);
    return true;
  }

  async deleteObject(key: string): Promise<boolean> {
    this.calls.delete.push(key);
    if (this.failDeleteKeys.has(key)) return false;
    this.objects.delete(key);
    return true;
  }

  async objectExists(key: string): Promise<boolean> {
    this.calls.exists.push(key);
    return this.objects.has(key);
  }

  async listKeys(prefix: string): Promise<string[]> {
    this.calls.list++;
    if (this.listError) throw new RemoteListError(prefix, this.listError);
    return [...this.objects.keys()].filter((k) => k.startsWith(prefix));
  }

  urlFor(relativeKey: string): string {
    return `https://test-bucket.storage.test/uploads/${relativeKey}`;
  }

  async testConnection(): Promise<ConnectionTestResult> {
    return { success: true, objectCount: Math.min(10, this.objects.size), durationMs: 0 };
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
