export interface ConnectionTestResult {
  success: boolean;
  /** Keys returned by the probe listing (at most 10). */
  objectCount?: number;
  durationMs: number;
  error?: string;
  errorCode?: string;
  errorDetail?: string;
}

/**
 * Object storage operations the engines depend on. Mutating calls report
 * failure through their return value; only listing throws.
 */
export interface IStorageService {
  /** Upload a local file under `key`. */
  putObject(localPath: string, key: string): Promise<boolean>;
  /** Delete `key`. Deleting an absent key counts as success. */
  deleteObject(key: string): Promise<boolean>;
  objectExists(key: string): Promise<boolean>;
  /**
   * Every key under `prefix`, across all pages.
   * @throws RemoteListError when any page fails.
   */
  listKeys(prefix: string): Promise<string[]>;
  /** Public URL of a key relative to the configured prefix. */
  urlFor(relativeKey: string): string;
  testConnection(): Promise<ConnectionTestResult>;
}
