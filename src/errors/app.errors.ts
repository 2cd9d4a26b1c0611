/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when risk thresholds or account parameters are
 * missing or invalid at startup. Fatal: the bot must not start.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Network error - thrown when RPC or API calls fail
 */
export class NetworkError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    cause?: Error,
  ) {
    super(message, "NETWORK_ERROR", cause);
  }
}

/**
 * Malformed response - a collaborator answered, but not in the expected shape
 */
export class MalformedResponseError extends AppError {
  constructor(
    message: string,
    public readonly source?: string,
    cause?: Error,
  ) {
    super(message, "MALFORMED_RESPONSE", cause);
  }
}

/**
 * GitHub API error
 */
export class GitHubError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, "GITHUB_ERROR", cause);
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
