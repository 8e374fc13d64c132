class ScraperError extends Error {
  constructor(
    message: string,
    public readonly isRetryable: boolean = false,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

class NetworkError extends ScraperError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, statusCode === undefined || statusCode >= 500, cause);
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }
}

/**
 * Raised when an API refuses further requests until its quota resets.
 */
class RateLimitError extends ScraperError {
  constructor(
    message: string,
    /** When the quota resets, if the server said so */
    public readonly resetAt?: Date,
  ) {
    super(message, false);
  }
}

class InvalidUrlError extends ScraperError {
  constructor(url: string, cause?: Error) {
    super(`Invalid URL: ${url}`, false, cause);
  }
}

class ParsingError extends ScraperError {
  constructor(message: string, cause?: Error) {
    super(`Failed to parse content: ${message}`, false, cause);
  }
}

export { ScraperError, NetworkError, RateLimitError, InvalidUrlError, ParsingError };
