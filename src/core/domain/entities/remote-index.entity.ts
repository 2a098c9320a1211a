/**
 * Keys that existed under the prefix when the listing ran. Built once per run
 * and never updated, so later bucket changes are not observed.
 */
export class RemoteIndex {
  private readonly keys: ReadonlySet<string>;

  constructor(
    readonly prefix: string,
    keys: Iterable<string>,
  ) {
    this.keys = new Set(keys);
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  get size(): number {
    return this.keys.size;
  }

  /** Keys in listing order. */
  values(): string[] {
    return [...this.keys];
  }
}
