/**
 * Error codes shared by the client, the HTTP surface and callers that want to
 * branch on failure kind without `instanceof`.
 */
export const ErrorCode = {
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Query translation
  QUERY_ERROR: 'QUERY_ERROR',
  UNKNOWN_METRIC: 'UNKNOWN_METRIC',
  INVALID_OUTPUT_FORMAT: 'INVALID_OUTPUT_FORMAT',

  // Name resolution
  NOT_FOUND: 'NOT_FOUND',
  SEASON_NOT_FOUND: 'SEASON_NOT_FOUND',
  PLAYER_NOT_FOUND: 'PLAYER_NOT_FOUND',
  CLUB_NOT_FOUND: 'CLUB_NOT_FOUND',
  AMBIGUOUS_MATCH: 'AMBIGUOUS_MATCH',

  // Upstream
  TRANSIENT_NETWORK_ERROR: 'TRANSIENT_NETWORK_ERROR',
  UPSTREAM_SHAPE_ERROR: 'UPSTREAM_SHAPE_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Query inputs attached to a failure so the caller can retry by hand. */
export type ErrorContext = Record<string, unknown>;

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR,
    public readonly context: ErrorContext = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when the environment or an explicit config override is invalid
 */
export class ConfigurationException extends AppException {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 500, ErrorCode.CONFIGURATION_ERROR, { issues });
  }
}

/**
 * Thrown for a bad query: unknown metric, bad output format, or an upstream 4xx.
 * Never retried.
 */
export class QueryException extends AppException {
  constructor(
    message: string,
    context: ErrorContext = {},
    errorCode: ErrorCodeType = ErrorCode.QUERY_ERROR
  ) {
    super(message, 400, errorCode, context);
  }
}

/**
 * Thrown when a season label, player name or club name does not resolve.
 * Some valid players are missing from the searchable list endpoint; callers
 * can pass the raw upstream id to the detail operations instead.
 */
export class NotFoundException extends AppException {
  constructor(
    message: string,
    context: ErrorContext = {},
    errorCode: ErrorCodeType = ErrorCode.NOT_FOUND
  ) {
    super(message, 404, errorCode, context);
  }
}

export interface AmbiguousCandidate {
  id: string;
  name: string;
}

/**
 * Thrown when a name matches more than one entity. The candidates are
 * returned so the caller can choose; resolution never picks one itself.
 */
export class AmbiguousMatchException extends AppException {
  constructor(
    message: string,
    public readonly candidates: AmbiguousCandidate[],
    context: ErrorContext = {}
  ) {
    super(message, 409, ErrorCode.AMBIGUOUS_MATCH, { ...context, candidates });
  }
}

/**
 * Thrown when the upstream response lacks required fields entirely
 * (as opposed to a known-missing metric, which normalizes to null).
 */
export class UpstreamShapeException extends AppException {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 502, ErrorCode.UPSTREAM_SHAPE_ERROR, context);
  }
}

/**
 * Thrown after retries are exhausted on network errors, timeouts or 5xx.
 */
export class TransientNetworkException extends AppException {
  public readonly originalError?: Error;

  constructor(
    message: string,
    public readonly attempts: number,
    context: ErrorContext = {},
    originalError?: Error
  ) {
    super(message, 503, ErrorCode.TRANSIENT_NETWORK_ERROR, { ...context, attempts });
    this.originalError = originalError;
  }

  /**
   * Re-raise a transient failure from inside a pagination walk, recording how
   * many pages had completed before it.
   */
  static duringWalk(
    error: TransientNetworkException,
    pagesCompleted: number
  ): TransientNetworkException {
    return new TransientNetworkException(
      `${error.message} (after ${pagesCompleted} page(s))`,
      error.attempts,
      { ...error.context, pagesCompleted },
      error.originalError
    );
  }
}

/**
 * Thrown on HTTP 429. Not retried; `retryAfterSeconds` echoes the upstream hint.
 */
export class RateLimitException extends AppException {
  constructor(
    public readonly retryAfterSeconds: number | null,
    context: ErrorContext = {}
  ) {
    super('Rate limit exceeded', 429, ErrorCode.RATE_LIMITED, { ...context, retryAfterSeconds });
  }
}

export const ResolutionErrors = {
  seasonNotFound: (label: string) =>
    new NotFoundException(`Unable to find the season: ${label}`, { label }, ErrorCode.SEASON_NOT_FOUND),
  playerNotFound: (name: string, season: string) =>
    new NotFoundException(
      `No players found matching '${name}'`,
      { name, season },
      ErrorCode.PLAYER_NOT_FOUND
    ),
  clubNotFound: (name: string, season: string) =>
    new NotFoundException(`No clubs found matching '${name}'`, { name, season }, ErrorCode.CLUB_NOT_FOUND),
};
