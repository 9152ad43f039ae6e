/**
 * Error classes for the tubescribe pipeline
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * An upstream service (YouTube, the model endpoint) failed
 */
export class UpstreamError extends PipelineError {
  statusCode?: number;

  constructor(message: string, statusCode?: number, details?: ErrorDetails) {
    super(message, details);
    this.name = 'UpstreamError';
    this.statusCode = statusCode;
  }

  toString(): string {
    const parts = [this.message];
    if (this.statusCode) {
      parts.push(`(status: ${this.statusCode})`);
    }
    return parts.join(' ');
  }
}

export class InvalidAPIKeyError extends UpstreamError {
  constructor(message: string, statusCode?: number, details?: ErrorDetails) {
    super(message, statusCode, details);
    this.name = 'InvalidAPIKeyError';
  }
}

export class NotFoundError extends UpstreamError {
  constructor(message: string, statusCode?: number, details?: ErrorDetails) {
    super(message, statusCode, details);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends UpstreamError {
  retryAfter?: number;

  constructor(message: string, retryAfter?: number, statusCode?: number, details?: ErrorDetails) {
    super(message, statusCode, details);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * YouTube Data API quota exhausted (403 quotaExceeded)
 */
export class QuotaExceededError extends UpstreamError {
  constructor(message: string, statusCode?: number, details?: ErrorDetails) {
    super(message, statusCode, details);
    this.name = 'QuotaExceededError';
  }
}

/**
 * Server error (5xx)
 */
export class ServerError extends UpstreamError {
  constructor(message: string, statusCode?: number, details?: ErrorDetails) {
    super(message, statusCode, details);
    this.name = 'ServerError';
  }
}

export class NetworkError extends UpstreamError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends UpstreamError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * The video exists but its owner turned captions off
 */
export class TranscriptsDisabledError extends UpstreamError {
  videoId: string;

  constructor(videoId: string) {
    super(`Transcripts are disabled for video ${videoId}`);
    this.name = 'TranscriptsDisabledError';
    this.videoId = videoId;
  }
}

/**
 * Captions are enabled but no usable track exists
 */
export class NoTranscriptFoundError extends UpstreamError {
  videoId: string;

  constructor(videoId: string, reason: string) {
    super(`No transcript found for video ${videoId}: ${reason}`);
    this.name = 'NoTranscriptFoundError';
    this.videoId = videoId;
  }
}

/**
 * Any other failure while fetching a transcript
 */
export class TranscriptFetchError extends UpstreamError {
  videoId: string;

  constructor(videoId: string, message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'TranscriptFetchError';
    this.videoId = videoId;
  }
}

/**
 * A font or stylesheet the renderer depends on is absent. Fatal for the run.
 */
export class ResourceMissingError extends PipelineError {
  resourcePath: string;

  constructor(resourcePath: string, hint?: string) {
    super(`Required resource not found: ${resourcePath}${hint ? `. ${hint}` : ''}`, {
      resourcePath,
    });
    this.name = 'ResourceMissingError';
    this.resourcePath = resourcePath;
  }
}

/**
 * The HTML-to-PDF engine could not produce the styled document
 */
export class StyledRenderError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, undefined, { cause });
    this.name = 'StyledRenderError';
  }
}

/**
 * Raised by the markup-to-layout conversion for constructs the basic
 * renderer does not lay out
 */
export class UnsupportedMarkupError extends PipelineError {
  tokenType: string;

  constructor(tokenType: string) {
    super(`Unsupported markup: ${tokenType}`, { tokenType });
    this.name = 'UnsupportedMarkupError';
    this.tokenType = tokenType;
  }
}

interface ApiErrorBody {
  error?: {
    message?: string;
    errors?: Array<{ reason?: string }>;
  };
}

function isApiErrorBody(v: unknown): v is ApiErrorBody {
  return typeof v === 'object' && v !== null && 'error' in v;
}

/**
 * Parse a Google-style error response and throw the matching error
 */
export function handleErrorResponse(response: Response, errorData?: unknown): never {
  const statusCode = response.status;
  const body = isApiErrorBody(errorData) ? errorData.error : undefined;
  const message = body?.message || response.statusText || `HTTP ${statusCode}`;
  const reason = body?.errors?.[0]?.reason;
  const details: ErrorDetails | undefined = reason ? { reason } : undefined;

  if (statusCode === 401 || (statusCode === 400 && reason === 'keyInvalid')) {
    throw new InvalidAPIKeyError(message, statusCode, details);
  } else if (statusCode === 403 && (reason === 'quotaExceeded' || reason === 'dailyLimitExceeded')) {
    throw new QuotaExceededError(message, statusCode, details);
  } else if (statusCode === 404) {
    throw new NotFoundError(message, statusCode, details);
  } else if (statusCode === 429) {
    const retryAfter = response.headers.get('Retry-After');
    const retryAfterSeconds = retryAfter ? parseInt(retryAfter, 10) : undefined;
    throw new RateLimitError(message, retryAfterSeconds, statusCode, details);
  } else if (statusCode >= 500) {
    throw new ServerError(message, statusCode, details);
  } else {
    throw new UpstreamError(message, statusCode, details);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
