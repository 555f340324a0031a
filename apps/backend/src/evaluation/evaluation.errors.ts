import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from '../common/errors';

export type EvaluationFailureReason =
  | 'TIMEOUT'
  | 'API_ERROR'
  | 'EMPTY_RESPONSE'
  | 'INVALID_JSON'
  | 'SCHEMA_INVALID';

/**
 * The provider answered (or the transport failed mid-call) but no canonical
 * evaluation could be produced. `rawResponse` is kept for server-side
 * diagnosis and is never rendered to HTTP clients.
 */
export class EvaluationFailedError extends BaseAppError {
  constructor(
    public readonly reason: EvaluationFailureReason,
    message: string,
    public readonly rawResponse?: string,
  ) {
    super(message, HttpStatus.BAD_GATEWAY, 'EVALUATION_FAILED', { reason });
  }
}

export class ProviderUnavailableError extends BaseAppError {
  constructor(
    public readonly providerName: string,
    reason = 'provider is not reachable',
  ) {
    super(
      `Evaluation provider ${providerName} is unavailable: ${reason}`,
      HttpStatus.SERVICE_UNAVAILABLE,
      'PROVIDER_UNAVAILABLE',
      { providerName },
    );
  }
}
