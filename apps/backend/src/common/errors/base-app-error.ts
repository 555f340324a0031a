import { HttpException, HttpStatus } from '@nestjs/common';

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'MALFORMED_AUDIO_INPUT'
  | 'EVALUATION_FAILED'
  | 'PROVIDER_UNAVAILABLE';

/**
 * Errors raised by the practice services. The exception filter renders
 * `errorCode` as the response `error` field and passes `details` through.
 */
export abstract class BaseAppError extends HttpException {
  protected constructor(
    message: string,
    readonly statusCode: HttpStatus,
    readonly errorCode: AppErrorCode,
    readonly details?: Record<string, unknown>,
  ) {
    super(message, statusCode);
    this.name = new.target.name;
  }
}
