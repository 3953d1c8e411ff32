export class ExtractorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeouts, dropped connections, 429 and 5xx answers. Retried by the HTTP client only. */
export class TransientNetworkError extends ExtractorError {}

export class HttpStatusError extends ExtractorError {
  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`HTTP ${status} for ${url}`);
  }
}

/** A feed, JSON document or model answer that does not have the expected shape. */
export class MalformedDataError extends ExtractorError {}

/** The browser or the vision model could not be started or used. */
export class ResourceError extends ExtractorError {}

export class DiscoveryError extends ExtractorError {}

export class ConfigError extends ExtractorError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
