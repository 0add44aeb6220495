import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { logger } from '../../config/logger.config';
import { ClientConfig } from '../../config/client.config';
import {
  AppException,
  QueryException,
  RateLimitException,
  TransientNetworkException,
  UpstreamShapeException,
} from '../../utils/exceptions';

export type QueryParams = Record<string, string | number | boolean>;

/** Anything that can run a GET against the upstream API and hand back parsed JSON. */
export interface RequestExecutor {
  execute(path: string, params?: QueryParams): Promise<unknown>;
}

export interface PulseliveApiClientOptions {
  /**
   * Transport override. Production uses axios' own http adapter; tests pass an
   * in-process adapter that answers from fixtures.
   */
  adapter?: AxiosAdapter;
}

/** The public site's headers; the API rejects requests without an origin. */
const UPSTREAM_HEADERS = {
  Accept: 'application/json',
  'content-type': 'application/x-www-form-urlencoded; charset=UTF-8',
  origin: 'https://www.premierleague.com',
  referer: 'https://www.premierleague.com',
};

/** Network error codes that indicate transient failures worth retrying */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'ERR_NETWORK',
]);

/**
 * Determines if an Axios error represents a transient failure that should be retried.
 * Returns true for 5xx server errors, timeouts, and network-level errors.
 * Returns false for 4xx client errors (permanent failures).
 */
export function isTransientError(error: unknown): error is AxiosError {
  if (!axios.isAxiosError(error)) return false;

  if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) return true;

  if (error.message?.includes('timeout')) return true;

  const status = error.response?.status;
  if (status !== undefined && status >= 500) return true;

  return false;
}

function parseRetryAfter(error: AxiosError): number | null {
  const header: unknown = error.response?.headers?.['retry-after'];
  if (typeof header !== 'string' && typeof header !== 'number') return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds : null;
}

/**
 * Request executor for footballapi.pulselive.com.
 *
 * Retries transient failures (network errors, timeouts, 5xx) up to
 * `maxRetries` times with a fixed `retryDelaySeconds` pause. 4xx responses are
 * query errors and fail immediately; 429 fails immediately as a rate limit.
 */
export class PulseliveApiClient implements RequestExecutor {
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(config: ClientConfig, options: PulseliveApiClientOptions = {}) {
    this.maxRetries = config.maxRetries;
    this.retryDelayMs = config.retryDelaySeconds * 1000;
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutSeconds * 1000,
      headers: UPSTREAM_HEADERS,
      // Parse the body ourselves so a non-JSON 200 is reported instead of passed through as a string
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      adapter: options.adapter,
    });
  }

  async execute(path: string, params: QueryParams = {}): Promise<unknown> {
    const body = await this.withRetry(async () => {
      const response = await this.client.get<unknown>(path, { params });
      return response.data;
    }, path, params);

    return this.parseBody(body, path, params);
  }

  /**
   * Execute a request with retry logic for transient failures.
   * Non-transient failures are translated once and never retried.
   */
  private async withRetry<T>(fn: () => Promise<T>, path: string, params: QueryParams): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!isTransientError(error)) {
          throw this.toPermanentError(error, path, params);
        }

        if (attempt >= this.maxRetries) {
          throw new TransientNetworkException(
            `Upstream request to ${path} failed after ${attempt + 1} attempt(s): ${error.message}`,
            attempt + 1,
            { path, params, status: error.response?.status, code: error.code },
            error
          );
        }

        logger.warn('Upstream transient error, retrying', {
          path,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delay: this.retryDelayMs,
          errorMessage: error.message,
          errorCode: error.code,
          status: error.response?.status,
        });
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      }
    }
  }

  private toPermanentError(error: unknown, path: string, params: QueryParams): Error {
    if (error instanceof AppException) return error;

    if (axios.isAxiosError(error) && error.response) {
      const status = error.response.status;
      if (status === 429) {
        return new RateLimitException(parseRetryAfter(error), { path, params });
      }
      return new QueryException(`Upstream rejected ${path} with status ${status}`, {
        path,
        params,
        status,
      });
    }

    return error instanceof Error ? error : new Error(String(error));
  }

  private parseBody(body: unknown, path: string, params: QueryParams): unknown {
    if (typeof body !== 'string') return body;

    try {
      return JSON.parse(body);
    } catch {
      throw new UpstreamShapeException('Invalid JSON response', { path, params });
    }
  }
}
