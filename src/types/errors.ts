import { hostOf } from '../helpers/shareUrl';

export type ErrorKind = 'validation' | 'extraction' | 'download' | 'auth' | 'network' | 'internal';

export class AppError extends Error {
  readonly kind: ErrorKind = 'internal';
  readonly transient: boolean = false;

  constructor(
    message: string,
    public readonly statusCode: number = 400,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class URLValidationError extends AppError {
  override readonly kind = 'validation';

  constructor(message = 'Unsupported share URL') {
    super(message, 400);
    this.name = 'URLValidationError';
  }
}

/** Request body that failed schema validation. */
export class RequestValidationError extends AppError {
  override readonly kind = 'validation';

  constructor(message: string) {
    super(message, 400);
    this.name = 'RequestValidationError';
  }
}

export class ExtractionError extends AppError {
  override readonly kind = 'extraction';

  constructor(message: string) {
    super(message, 422);
    this.name = 'ExtractionError';
  }
}

export class DownloadError extends AppError {
  override readonly kind = 'download';

  constructor(message: string) {
    super(message, 422);
    this.name = 'DownloadError';
  }
}

export class AuthError extends AppError {
  override readonly kind = 'auth';

  constructor(message: string) {
    super(message, 401);
    this.name = 'AuthError';
  }
}

/**
 * Connectivity failure surfaced after the transport gave up retrying.
 * `transient` tells callers whether retrying later is likely to help.
 */
export class NetworkError extends AppError {
  override readonly kind = 'network';
  override readonly transient: boolean;

  constructor(message: string, transient = true) {
    super(message, 502);
    this.name = 'NetworkError';
    this.transient = transient;
  }
}

export class TimeoutError extends NetworkError {
  constructor(message = 'Request timed out') {
    super(message, true);
    this.name = 'TimeoutError';
  }
}

export class HttpStatusError extends NetworkError {
  constructor(
    public readonly status: number,
    public readonly url: string,
    transient: boolean,
  ) {
    super(`HTTP ${status} from ${hostOf(url)}`, transient);
    this.name = 'HttpStatusError';
  }
}

export interface ErrorDescription {
  message: string;
  errorKind: ErrorKind;
  retryable: boolean;
}

/**
 * Collapse anything thrown into the shape carried by failed results.
 */
export function describeError(err: unknown): ErrorDescription {
  if (err instanceof AppError) {
    return { message: err.message, errorKind: err.kind, retryable: err.transient };
  }
  if (err instanceof SyntaxError) {
    return { message: 'Malformed response from upstream service', errorKind: 'extraction', retryable: false };
  }
  return {
    message: err instanceof Error ? err.message : String(err),
    errorKind: 'internal',
    retryable: false,
  };
}

/**
 * HTTP status the API answers with for a failed result.
 */
export function statusForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'validation': return 400;
    case 'auth': return 401;
    case 'network': return 502;
    case 'internal': return 500;
    case 'extraction':
    case 'download':
    default: return 422;
  }
}
