export interface ILocalFileService {
  exists(path: string): Promise<boolean>;
  /** Returns false when the file could not be removed. */
  remove(path: string): Promise<boolean>;
}
