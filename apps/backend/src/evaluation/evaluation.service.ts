import { Inject, Injectable, Logger } from '@nestjs/common';
import { EVALUATION_PROVIDER } from './evaluation.constants';
import { EvaluationFailedError, ProviderUnavailableError } from './evaluation.errors';
import { EvaluationLogsService, type EvaluationLogInput } from './evaluation-logs.service';
import type {
  EvaluationInputs,
  EvaluationKind,
  EvaluationOutcome,
  EvaluationResults,
  ProviderName,
  SpeakingInput,
  WritingInput,
} from './evaluation.types';
import type { EvaluationProvider, ProviderResult } from './providers/provider.interface';

type Dispatch = {
  [K in EvaluationKind]: (
    provider: EvaluationProvider,
    input: EvaluationInputs[K],
  ) => Promise<ProviderResult<EvaluationResults[K]>>;
};

const DISPATCH: Dispatch = {
  'speaking-basic': (provider, input) => provider.evaluateSpeaking(input),
  'speaking-enhanced': (provider, input) => provider.evaluateSpeakingEnhanced(input),
  'writing-basic': (provider, input) => provider.evaluateWriting(input),
  'writing-enhanced': (provider, input) => provider.evaluateWritingEnhanced(input),
};

const inputLength = (input: SpeakingInput | WritingInput): number =>
  'transcript' in input ? input.transcript.length : input.essayText.length;

export type EvaluationStatus = {
  providerName: ProviderName;
  modelName: string;
  available: boolean;
  reason?: string;
};

/**
 * Single entry point for content evaluation. The provider is fixed at
 * startup; every call is health-checked, timed and logged.
 */
@Injectable()
export class EvaluationService {
  private readonly logger = new Logger(EvaluationService.name);

  constructor(
    @Inject(EVALUATION_PROVIDER) private readonly provider: EvaluationProvider,
    private readonly evaluationLogsService: EvaluationLogsService,
  ) {}

  async evaluate<K extends EvaluationKind>(
    kind: K,
    input: EvaluationInputs[K],
  ): Promise<EvaluationOutcome<EvaluationResults[K]>> {
    const { providerName, modelName } = this.provider.describe();
    const health = await this.provider.healthCheck();
    if (!health.available) {
      this.logger.warn(`Provider ${providerName} unavailable: ${health.reason ?? 'unknown reason'}`);
      throw new ProviderUnavailableError(providerName, health.reason);
    }

    const call: Dispatch[K] = DISPATCH[kind];
    const startedAt = Date.now();
    const logBase = { kind, providerName, model: modelName, inputLength: inputLength(input) };

    try {
      const { result, rawResponse } = await call(this.provider, input);
      const responseTimeMs = Date.now() - startedAt;
      this.recordCall({ ...logBase, status: 'OK', latencyMs: responseTimeMs, response: rawResponse });
      return { result, meta: { providerName, modelName, responseTimeMs } };
    } catch (error) {
      const failure = this.toFailure(error);
      this.recordCall({
        ...logBase,
        status: 'ERROR',
        latencyMs: Date.now() - startedAt,
        error: failure.message,
        response: failure instanceof EvaluationFailedError ? failure.rawResponse : undefined,
      });
      this.logger.error(`Evaluation ${kind} failed on ${providerName}: ${failure.message}`);
      throw failure;
    }
  }

  async getStatus(): Promise<EvaluationStatus> {
    const { providerName, modelName } = this.provider.describe();
    const health = await this.provider.healthCheck();
    return { providerName, modelName, ...health };
  }

  private toFailure(error: unknown): EvaluationFailedError | ProviderUnavailableError {
    if (error instanceof EvaluationFailedError || error instanceof ProviderUnavailableError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new EvaluationFailedError('API_ERROR', `Unexpected evaluation error: ${message}`);
  }

  private recordCall(input: EvaluationLogInput) {
    try {
      this.evaluationLogsService.logCall(input);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown log error';
      this.logger.warn(`Failed to log evaluation call: ${message}`);
    }
  }
}
