export type ConfigErrorKind =
  | "missing-env"
  | "invalid-env"
  | "conflicting-env"
  | "content-file-missing"
  | "theme-not-found";

/** Anything wrong with the environment, the content file or the theme. Fatal. */
export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;

  constructor(kind: ConfigErrorKind, message: string) {
    super(message);
    this.name = "ConfigError";
    this.kind = kind;
  }
}

/** The TV could not be reached, usually because it is powered off. */
export class TvConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TvConnectionError";
  }
}

/** The TV answered a request with an error event, or not at all. */
export class TvRequestError extends Error {
  readonly request: string;

  constructor(request: string, message: string) {
    super(`${request}: ${message}`);
    this.name = "TvRequestError";
    this.request = request;
  }
}
