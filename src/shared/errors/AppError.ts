/**
 * Pipeline stage an error belongs to
 */
export type PipelineStage = 'config' | 'url' | 'fetch' | 'extract' | 'download' | 'internal';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly stage: PipelineStage;
  public details?: ErrorDetails;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    stage: PipelineStage,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: ErrorDetails
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.stage = stage;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON
   */
  toJSON(): ErrorResponse {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stage: this.stage,
      statusCode: this.statusCode,
      timestamp: this.timestamp,
      details: this.details
    };
  }
}

/**
 * Error response interface
 */
export interface ErrorResponse {
  name: string;
  message: string;
  code: string;
  stage: PipelineStage;
  statusCode: number;
  timestamp: Date;
  details?: ErrorDetails;
}

/**
 * The input is not a supported post URL
 */
export class InvalidUrlError extends AppError {
  constructor(url: string, reason: string) {
    super(`Invalid post URL '${url}': ${reason}`, 'INVALID_URL', 'url', 400, true, { url, reason });
  }
}

/**
 * Connection failure or timeout
 */
export class NetworkError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'NETWORK_ERROR', 'fetch', 503, true, details);
  }
}

/**
 * Upstream answered with a non-2xx status
 */
export class HttpError extends AppError {
  public readonly status: number;

  constructor(url: string, status: number, statusText: string = '') {
    const suffix = statusText ? ` ${statusText}` : '';
    super(`GET ${url} returned ${status}${suffix}`, 'HTTP_ERROR', 'fetch', status, true, {
      url,
      status
    });
    this.status = status;
  }
}

/**
 * Upstream answered 2xx with nothing in the body
 */
export class EmptyResponseError extends AppError {
  constructor(url: string) {
    super(`Empty response body from ${url}`, 'EMPTY_RESPONSE', 'fetch', 502, true, { url });
  }
}

/**
 * Page content is neither markup nor structured text
 */
export class ParseError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'PARSE_ERROR', 'extract', 422, true, details);
  }
}

/**
 * Filesystem failure while saving one entry
 */
export class WriteError extends AppError {
  constructor(filePath: string, message: string, details?: ErrorDetails) {
    super(`Failed to write ${filePath}: ${message}`, 'WRITE_ERROR', 'download', 500, true, {
      path: filePath,
      ...details
    });
  }
}

/**
 * Network failure while transferring one entry
 */
export class TransferError extends AppError {
  public readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(`Transfer of ${url} failed: ${message}`, 'TRANSFER_ERROR', 'download', status ?? 502, true, {
      url,
      ...(status !== undefined && { status })
    });
    this.status = status;
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIGURATION_ERROR', 'config', 500, false, details);
  }
}

/**
 * Internal error
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal error', details?: ErrorDetails) {
    super(message, 'INTERNAL_ERROR', 'internal', 500, false, details);
  }
}

/**
 * HTTP status carried by an error, if any
 */
export function getHttpStatus(error: AppError): number | undefined {
  if (error instanceof HttpError || error instanceof TransferError) {
    return error.status;
  }
  return undefined;
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
