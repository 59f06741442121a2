/** How a page fetch failed */
export type FetchErrorKind = "network" | "render" | "blocked";

/** How an output file failed to write */
export type SerializeErrorKind = "io" | "encoding";

/**
 * A page could not be retrieved. `blocked` means the site throttled us
 * (HTTP 429/503 or a robot check page) and should not be hammered again.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status: number | null;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    options: { status?: number | null; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.status = options.status ?? null;
  }
}

/** An output file could not be written; nothing was left at the target path. */
export class SerializeError extends Error {
  readonly kind: SerializeErrorKind;
  readonly path: string;

  constructor(
    kind: SerializeErrorKind,
    path: string,
    message: string,
    options: { cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "SerializeError";
    this.kind = kind;
    this.path = path;
  }
}

/** Invalid command-line input, raised before any network activity. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
