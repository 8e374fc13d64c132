import axios, { type AxiosRequestConfig } from "axios";
import type { z } from "zod";
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  USER_AGENT,
} from "../../config";
import { NetworkError, ParsingError, RateLimitError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { ContentFetcher, FetchOptions, RawContent } from "./types";

export interface HttpFetcherOptions {
  /** Fixed pause before every request after the first */
  requestDelay?: number;
  maxRetries?: number;
  /** Base delay for exponential retry backoff */
  retryDelay?: number;
  timeout?: number;
  userAgent?: string;
}

interface FailureDetails {
  status?: number;
  code?: string;
  message: string;
  headers?: unknown;
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (typeof headers !== "object" || headers === null || !(name in headers)) {
    return undefined;
  }
  const value: unknown = Reflect.get(headers, name);
  if (typeof value === "string") {
    return value;
  }
  return typeof value === "number" ? String(value) : undefined;
}

/**
 * Pulls status, code and headers out of an axios rejection without trusting its shape.
 */
function describeFailure(error: unknown): FailureDetails {
  if (typeof error !== "object" || error === null) {
    return { message: String(error) };
  }
  const details: FailureDetails = {
    message: "message" in error && typeof error.message === "string" ? error.message : "Unknown error",
  };
  if ("code" in error && typeof error.code === "string") {
    details.code = error.code;
  }
  if ("response" in error && typeof error.response === "object" && error.response !== null) {
    const response = error.response;
    if ("status" in response && typeof response.status === "number") {
      details.status = response.status;
    }
    if ("headers" in response) {
      details.headers = response.headers;
    }
  }
  return details;
}

/**
 * GitHub signals an exhausted quota with 429, or with 403 and a zero remaining count.
 */
function isRateLimited(failure: FailureDetails): boolean {
  if (failure.status === 429) {
    return true;
  }
  return (
    failure.status === 403 && headerValue(failure.headers, "x-ratelimit-remaining") === "0"
  );
}

function rateLimitReset(headers: unknown): Date | undefined {
  const reset = headerValue(headers, "x-ratelimit-reset");
  if (reset && /^\d+$/.test(reset)) {
    return new Date(Number(reset) * 1000);
  }
  const retryAfter = headerValue(headers, "retry-after");
  if (retryAfter && /^\d+$/.test(retryAfter)) {
    return new Date(Date.now() + Number(retryAfter) * 1000);
  }
  return undefined;
}

/**
 * Fetches listings and API documents over HTTP/HTTPS, one request at a time.
 * Every request after the first waits `requestDelay` ms so the artifact host
 * is not hammered; failures without a response or with a 5xx status are retried.
 */
export class HttpFetcher implements ContentFetcher {
  private readonly requestDelay: number;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly timeout: number;
  private readonly userAgent: string;
  private requestCount = 0;

  constructor(options: HttpFetcherOptions = {}) {
    this.requestDelay = options.requestDelay ?? DEFAULT_REQUEST_DELAY_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelay = options.retryDelay ?? 1000;
    this.timeout = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? USER_AGENT;
  }

  canFetch(source: string): boolean {
    return source.startsWith("http://") || source.startsWith("https://");
  }

  private async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private async pace(): Promise<void> {
    if (this.requestCount > 0 && this.requestDelay > 0) {
      await this.delay(this.requestDelay);
    }
    this.requestCount++;
  }

  async fetch(source: string, options?: FetchOptions): Promise<RawContent> {
    const maxRetries = options?.maxRetries ?? this.maxRetries;
    const baseDelay = options?.retryDelay ?? this.retryDelay;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      await this.pace();
      try {
        const config: AxiosRequestConfig = {
          responseType: "text",
          headers: { "User-Agent": this.userAgent, ...options?.headers },
          timeout: options?.timeout ?? this.timeout,
        };

        const response = await axios.get<string>(source, config);

        return {
          content: response.data,
          mimeType: headerValue(response.headers, "content-type") ?? "text/html",
          source,
          status: response.status,
        } satisfies RawContent;
      } catch (error: unknown) {
        const failure = describeFailure(error);
        const { status, code } = failure;

        if (isRateLimited(failure)) {
          throw new RateLimitError(
            `Rate limit exceeded for ${source} (Status: ${status})`,
            rateLimitReset(failure.headers),
          );
        }

        const networkError = new NetworkError(
          `Failed to fetch ${source} after ${attempt + 1} attempts: ${failure.message}`,
          status,
          error instanceof Error ? error : undefined,
        );
        if (!networkError.isRetryable || attempt >= maxRetries) {
          throw networkError;
        }

        const delay = baseDelay * 2 ** attempt;
        logger.warn(
          `Attempt ${attempt + 1}/${
            maxRetries + 1
          } failed for ${source} (Status: ${status}, Code: ${code}). Retrying in ${delay}ms...`,
        );
        await this.delay(delay);
      }
    }
    throw new NetworkError(`Failed to fetch ${source} after ${maxRetries + 1} attempts`);
  }

  /**
   * Fetches a JSON document and validates it against `schema`.
   * @throws {ParsingError} If the body is not JSON or does not match the schema
   */
  async fetchJson<T>(
    source: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: FetchOptions,
  ): Promise<T> {
    const raw = await this.fetch(source, {
      ...options,
      headers: { Accept: "application/json", ...options?.headers },
    });

    let body: unknown;
    try {
      body = JSON.parse(raw.content);
    } catch (error) {
      throw new ParsingError(
        `${source} did not return JSON`,
        error instanceof Error ? error : undefined,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ParsingError(`Unexpected response shape from ${source}: ${result.error.message}`);
    }
    return result.data;
  }
}
