import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from './base-app-error';

export type ValidationField = {
  field: string;
  message: string;
};

/** Input that passed DTO validation but still cannot be assessed. */
export class ValidationError extends BaseAppError {
  constructor(
    message: string,
    readonly fields?: ValidationField[],
  ) {
    super(message, HttpStatus.BAD_REQUEST, 'VALIDATION_ERROR');
  }
}
