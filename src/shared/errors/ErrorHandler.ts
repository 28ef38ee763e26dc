import { AppError, ErrorResponse, InternalError, NetworkError, getHttpStatus } from './AppError';
import { ILogger } from '../logging/Logger';

/**
 * Turns anything thrown into an AppError, logs it, and renders the
 * one-line message shown to the user
 */
export class ErrorHandler {
  constructor(private readonly logger: ILogger) {}

  /**
   * Handle error
   */
  handle(error: unknown): ErrorResponse {
    const appError = this.normalizeError(error);

    this.logError(appError);

    return appError.toJSON();
  }

  /**
   * Human-readable message naming the failed stage
   */
  describe(error: unknown): string {
    const appError = this.normalizeError(error);
    const status = getHttpStatus(appError);
    const suffix = status !== undefined ? ` (HTTP ${status})` : '';
    return `[${appError.stage}] ${appError.message}${suffix}`;
  }

  /**
   * Normalize error to AppError
   */
  normalizeError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (!(error instanceof Error)) {
      return new InternalError(String(error));
    }

    if (error.message.includes('ECONNREFUSED') || error.message.includes('ENOTFOUND')) {
      return new NetworkError(error.message, { originalError: error.name });
    }

    return new InternalError(error.message, {
      originalError: error.name,
      stack: error.stack
    });
  }

  /**
   * Log error
   */
  private logError(error: AppError): void {
    if (error.isOperational) {
      this.logger.error(`[${error.code}] ${error.message}`, undefined, error.details);
    } else {
      this.logger.fatal('Non-operational error', error, error.details);
    }
  }
}
