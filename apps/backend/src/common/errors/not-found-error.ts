import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from './base-app-error';

export class NotFoundError extends BaseAppError {
  constructor(resource: string, id: string | number) {
    super(`${resource} ${id} not found`, HttpStatus.NOT_FOUND, 'NOT_FOUND', { resource, id });
  }
}
