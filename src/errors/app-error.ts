/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /** Extra fields that are safe to render to the client. */
  get details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export type ValidationReason = 'InvalidFormat' | 'InvalidBody' | 'InvalidHeader';

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Validation error (400)
 */
export class ValidationError extends AppError {
  public readonly reason: ValidationReason;
  public readonly issues: readonly FieldIssue[];

  constructor(
    message: string,
    reason: ValidationReason = 'InvalidBody',
    issues: readonly FieldIssue[] = []
  ) {
    super(message, 400, 'VALIDATION_ERROR');
    this.reason = reason;
    this.issues = issues;
  }

  override get details(): Record<string, unknown> {
    return this.issues.length > 0
      ? { reason: this.reason, issues: this.issues }
      : { reason: this.reason };
  }
}

export type SecurityReason =
  | 'DisallowedDomain'
  | 'PrivateAddress'
  | 'DisallowedPort'
  | 'UnresolvableHost';

const SECURITY_MESSAGES: Record<SecurityReason, string> = {
  DisallowedDomain: 'The requested host is not a supported media domain',
  PrivateAddress: 'Access to private networks is not allowed',
  DisallowedPort: 'Access to non-standard ports is not allowed',
  UnresolvableHost: 'The requested host could not be verified',
};

/**
 * SSRF guard rejection (403). The message never names the host or address.
 */
export class SecurityRejectionError extends AppError {
  public readonly reason: SecurityReason;

  constructor(reason: SecurityReason) {
    super(SECURITY_MESSAGES[reason], 403, 'SECURITY_REJECTION');
    this.reason = reason;
  }

  override get details(): Record<string, unknown> {
    return { reason: this.reason };
  }
}

/**
 * Request body over the configured ceiling (413)
 */
export class PayloadTooLargeError extends AppError {
  public readonly limitBytes: number;

  constructor(limitBytes: number) {
    super(
      `Request body must be smaller than ${limitBytes} bytes`,
      413,
      'PAYLOAD_TOO_LARGE'
    );
    this.limitBytes = limitBytes;
  }
}

/**
 * Rate limit error (429)
 */
export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(retryAfter: number) {
    super('Too many requests', 429, 'RATE_LIMITED');
    this.retryAfter = retryAfter;
  }

  override get details(): Record<string, unknown> {
    return { retryAfter: this.retryAfter };
  }
}

/**
 * The extraction service refused the request (4xx); retrying cannot help.
 */
export class UpstreamRejectedError extends AppError {
  public readonly upstreamStatus: number;

  constructor(upstreamStatus: number) {
    const notFound = upstreamStatus === 404;
    super(
      notFound
        ? 'The requested media could not be found'
        : 'The requested media could not be processed',
      notFound ? 404 : 422,
      'UPSTREAM_REJECTED'
    );
    this.upstreamStatus = upstreamStatus;
  }
}

/**
 * Extraction service unreachable after the retry budget, or known to be down (503)
 */
export class UpstreamUnavailableError extends AppError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(
      'Media service is temporarily unavailable',
      503,
      'UPSTREAM_UNAVAILABLE'
    );
    this.attempts = attempts;
  }
}

/**
 * Stream deadline elapsed (408)
 */
export class StreamTimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(
      'Download took too long to complete',
      408,
      'STREAM_TIMEOUT'
    );
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Upstream or internal failure in the middle of a transfer (500)
 */
export class StreamAbortedError extends AppError {
  constructor(message = 'Unable to process media stream') {
    super(message, 500, 'STREAM_ABORTED');
  }
}

/**
 * Client went away before a response could be produced (499)
 */
export class RequestAbortedError extends AppError {
  constructor() {
    super('Request was canceled by the client', 499, 'REQUEST_ABORTED');
  }
}

export type UpstreamFailureKind = 'http' | 'transport' | 'timeout' | 'aborted';

/**
 * Raw failure of a single extraction call. Never rendered to clients; the
 * orchestrator turns it into one of the errors above.
 */
export class UpstreamCallError extends Error {
  public readonly kind: UpstreamFailureKind;
  public readonly httpStatus?: number;

  constructor(message: string, kind: UpstreamFailureKind, httpStatus?: number) {
    super(message);
    this.name = 'UpstreamCallError';
    this.kind = kind;
    this.httpStatus = httpStatus;
    Error.captureStackTrace(this, this.constructor);
  }

  get isClientError(): boolean {
    return (
      this.httpStatus !== undefined &&
      this.httpStatus >= 400 &&
      this.httpStatus < 500
    );
  }
}
