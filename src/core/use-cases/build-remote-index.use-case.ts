import { IStorageService } from "../domain/services/storage.service.js";
import { RemoteIndex } from "../domain/entities/remote-index.entity.js";
import { RemoteListError } from "../domain/errors.js";

export class BuildRemoteIndexUseCase {
  constructor(private storage: IStorageService) {}

  /**
   * Lists everything under `prefix` once. Either the whole listing succeeds or
   * the run gets a RemoteListError; a partial index is never returned.
   */
  async execute(prefix: string): Promise<RemoteIndex> {
    try {
      const keys = await this.storage.listKeys(prefix);
      return new RemoteIndex(prefix, keys);
    } catch (e) {
      if (e instanceof RemoteListError) throw e;
      throw new RemoteListError(prefix, e);
    }
  }
}
