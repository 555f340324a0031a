export { BaseAppError, type AppErrorCode } from './base-app-error';
export { NotFoundError } from './not-found-error';
export { ValidationError, type ValidationField } from './validation-error';
