/**
 * Remote listing could not complete. Any run that needs the remote index aborts
 * before touching files.
 */
export class RemoteListError extends Error {
  constructor(
    readonly prefix: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not list remote objects under "${prefix}": ${detail}`, {
      cause,
    });
    this.name = "RemoteListError";
  }
}

/** Storage credentials, bucket or endpoint are missing. Raised before any engine runs. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly fields: string[] = [],
  ) {
    super(fields.length > 0 ? `${message}: ${fields.join(", ")}` : message);
    this.name = "ConfigurationError";
  }
}
