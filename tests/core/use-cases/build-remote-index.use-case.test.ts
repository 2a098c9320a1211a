import { BuildRemoteIndexUseCase } from "../../../src/core/use-cases/build-remote-index.use-case.js";
import { RemoteListError } from "../../../src/core/domain/errors.js";
import { InMemoryStorageService } from "../../mocks/in-memory-storage.service.js";

describe("BuildRemoteIndexUseCase", () => {
  test("indexes every key under the prefix", async () => {
    const storage = new InMemoryStorageService([
      "uploads/a.jpg",
      "uploads/2024/b.jpg",
      "other/c.jpg",
    ]);
    const index = await new BuildRemoteIndexUseCase(storage).execute("uploads/");

    expect(index.prefix).toBe("uploads/");
    expect(index.size).toBe(2);
    expect(index.has("uploads/2024/b.jpg")).toBe(true);
    expect(index.has("other/c.jpg")).toBe(false);
  });

  test("returns an empty index for an empty bucket", async () => {
    const index = await new BuildRemoteIndexUseCase(new InMemoryStorageService()).execute("uploads/");
    expect(index.size).toBe(0);
  });

  test("propagates a listing failure", async () => {
    const storage = new InMemoryStorageService(["uploads/a.jpg"]);
    storage.listError = new Error("AccessDenied");

    await expect(new BuildRemoteIndexUseCase(storage).execute("uploads/")).rejects.toThrow(
      RemoteListError,
    );
  });

  test("wraps unexpected errors in RemoteListError", async () => {
    class HangingStorage extends InMemoryStorageService {
      async listKeys(): Promise<string[]> {
        throw new Error("socket hang up");
      }
    }
    const failing = new HangingStorage();

    const error = await new BuildRemoteIndexUseCase(failing)
      .execute("uploads/")
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteListError);
    expect(error).toMatchObject({
      prefix: "uploads/",
      message: 'Could not list remote objects under "uploads/": socket hang up',
    });
  });
});
