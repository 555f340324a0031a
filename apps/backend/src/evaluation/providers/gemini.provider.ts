import { Injectable, Logger } from '@nestjs/common';
import { EvaluationConfigService, type EvaluationRuntimeConfig } from '../evaluation-config.service';
import { EvaluationFailedError, ProviderUnavailableError } from '../evaluation.errors';
import { isRecord, type JsonRecord } from '../normalization/normalize-keys';
import { toGenaiSchema } from '../schemas/genai-schema';
import { BaseEvaluationProvider, type Completion, type CompletionRequest } from './base.provider';
import { GeminiClientFactory, type GeminiTextClient } from './gemini-client.factory';
import type { ProviderDescriptor, ProviderHealth } from './provider.interface';

const MISSING_KEY = 'GEMINI_API_KEY is not configured';

/**
 * Hosted evaluation through the Gemini API. The response schema constrains
 * the model output, so replies are validated without key normalization.
 */
@Injectable()
export class GeminiProvider extends BaseEvaluationProvider {
  protected readonly logger = new Logger(GeminiProvider.name);
  private readonly runtimeConfig: EvaluationRuntimeConfig;
  private client?: GeminiTextClient;

  constructor(
    evaluationConfigService: EvaluationConfigService,
    private readonly clientFactory: GeminiClientFactory,
  ) {
    super();
    this.runtimeConfig = evaluationConfigService.resolveRuntimeConfig();
  }

  describe(): ProviderDescriptor {
    return { providerName: 'gemini', modelName: this.runtimeConfig.gemini.model };
  }

  async healthCheck(): Promise<ProviderHealth> {
    return this.runtimeConfig.gemini.apiKey ? { available: true } : { available: false, reason: MISSING_KEY };
  }

  protected async complete({ profile, systemPrompt, userPrompt }: CompletionRequest): Promise<Completion> {
    const client = this.getClient();
    let text: string | undefined;
    try {
      const response = await client.generateContent({
        model: this.runtimeConfig.gemini.model,
        contents: userPrompt,
        config: {
          systemInstruction: systemPrompt,
          temperature: this.runtimeConfig.temperature,
          responseMimeType: 'application/json',
          responseSchema: toGenaiSchema(profile.schema),
        },
      });
      text = response.text;
    } catch (error) {
      throw this.toFailure(error);
    }

    if (!text?.trim()) {
      throw new EvaluationFailedError('EMPTY_RESPONSE', 'Gemini returned an empty response');
    }
    this.logger.debug(`Gemini raw response: ${text.slice(0, 500)}`);

    return { payload: this.parseReply(text), rawText: text };
  }

  // Schema-constrained output is parsed as is; anything that is not a bare
  // JSON object is a failed call.
  private parseReply(text: string): JsonRecord {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new EvaluationFailedError('INVALID_JSON', 'Gemini response is not valid JSON', text);
    }
    if (!isRecord(parsed)) {
      throw new EvaluationFailedError('INVALID_JSON', 'Gemini response is not a JSON object', text);
    }
    return parsed;
  }

  private getClient(): GeminiTextClient {
    const { apiKey, timeoutMs } = this.runtimeConfig.gemini;
    if (!apiKey) {
      throw new ProviderUnavailableError('gemini', MISSING_KEY);
    }
    if (!this.client) {
      this.client = this.clientFactory.create({ apiKey, timeoutMs });
    }
    return this.client;
  }

  private toFailure(error: unknown): EvaluationFailedError {
    const message = error instanceof Error ? error.message : String(error);
    const timedOut =
      error instanceof Error && (error.name === 'AbortError' || /timed? ?out|aborted/i.test(error.message));
    if (timedOut) {
      this.logger.warn(`Gemini request timed out after ${this.runtimeConfig.gemini.timeoutMs}ms`);
      return new EvaluationFailedError('TIMEOUT', 'Gemini request timed out');
    }
    this.logger.warn(`Gemini API error: ${message}`);
    return new EvaluationFailedError('API_ERROR', `Gemini API error: ${message}`);
  }
}
