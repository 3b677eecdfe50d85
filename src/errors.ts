export class ConfigError extends Error {
  override name = "ConfigError";
}

export class PostingsFileError extends Error {
  override name = "PostingsFileError";

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Raised when the persisted index cannot be loaded and the policy is to fail closed. */
export class CrossSessionLoadError extends Error {
  override name = "CrossSessionLoadError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
