import { Injectable, Logger } from '@nestjs/common';
import { EvaluationConfigService, type EvaluationRuntimeConfig } from '../evaluation-config.service';
import { EvaluationFailedError } from '../evaluation.errors';
import { extractJsonObject } from '../normalization/extract-json';
import { isRecord, normalizeEvaluationKeys } from '../normalization/normalize-keys';
import type { EvaluationProfile } from '../profiles/evaluation.profiles';
import { buildFlatKeyInstructions } from '../prompts/flat-keys.template';
import { BaseEvaluationProvider, type Completion, type CompletionRequest } from './base.provider';
import type { ProviderDescriptor, ProviderHealth } from './provider.interface';

const readMessageContent = (data: unknown): string => {
  if (!isRecord(data) || !isRecord(data.message)) {
    return '';
  }
  return typeof data.message.content === 'string' ? data.message.content : '';
};

/**
 * Local evaluation through an Ollama server. Small local models ignore
 * response schemas, so the reply is extracted from free text and its keys
 * normalized before validation.
 */
@Injectable()
export class OllamaProvider extends BaseEvaluationProvider {
  protected readonly logger = new Logger(OllamaProvider.name);
  private readonly runtimeConfig: EvaluationRuntimeConfig;

  constructor(evaluationConfigService: EvaluationConfigService) {
    super();
    this.runtimeConfig = evaluationConfigService.resolveRuntimeConfig();
  }

  describe(): ProviderDescriptor {
    return { providerName: 'ollama', modelName: this.runtimeConfig.ollama.model };
  }

  async healthCheck(): Promise<ProviderHealth> {
    const { baseUrl, healthTimeoutMs } = this.runtimeConfig.ollama;
    try {
      const response = await this.fetchWithTimeout(`${baseUrl}/api/tags`, { method: 'GET' }, healthTimeoutMs);
      return response.status === 200
        ? { available: true }
        : { available: false, reason: `Ollama responded with status ${response.status}` };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'unknown error';
      return { available: false, reason: `Ollama is not reachable at ${baseUrl}: ${message}` };
    }
  }

  protected buildSystemPrompt(profile: EvaluationProfile): string {
    return `${super.buildSystemPrompt(profile)}\n\n${buildFlatKeyInstructions(profile)}`;
  }

  protected async complete({ profile, systemPrompt, userPrompt }: CompletionRequest): Promise<Completion> {
    const { baseUrl, model, timeoutMs } = this.runtimeConfig.ollama;
    const payload = {
      model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      format: 'json',
      stream: false,
      options: { temperature: this.runtimeConfig.temperature },
    };

    let response: Response;
    try {
      response = await this.fetchWithTimeout(
        `${baseUrl}/api/chat`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
        },
        timeoutMs,
      );
    } catch (error) {
      if (error instanceof EvaluationFailedError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new EvaluationFailedError('API_ERROR', `Ollama request failed: ${message}`);
    }

    const body = await response.text();
    if (!response.ok) {
      this.logger.warn(`Ollama API error: ${response.status} ${body.slice(0, 200)}`);
      throw new EvaluationFailedError('API_ERROR', `Ollama API error: ${response.status}`, body);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new EvaluationFailedError('INVALID_JSON', 'Ollama response body is not JSON', body);
    }

    const content = readMessageContent(data);
    if (!content.trim()) {
      throw new EvaluationFailedError('EMPTY_RESPONSE', 'Ollama returned an empty message', body);
    }
    this.logger.debug(`Ollama raw response: ${content.slice(0, 500)}`);

    const extracted = extractJsonObject(content);
    this.logger.debug(`Ollama parsed keys: ${Object.keys(extracted).join(', ')}`);
    return { payload: normalizeEvaluationKeys(extracted, profile.normalization), rawText: content };
  }

  private async fetchWithTimeout(url: string, options: RequestInit, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetch(url, { ...options, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new EvaluationFailedError('TIMEOUT', `Ollama request timed out after ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
