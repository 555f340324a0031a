import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ProviderName } from './evaluation.types';

export type GeminiSettings = {
  apiKey?: string;
  model: string;
  timeoutMs: number;
};

export type OllamaSettings = {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  healthTimeoutMs: number;
};

export type EvaluationRuntimeConfig = {
  provider: ProviderName;
  temperature: number;
  gemini: GeminiSettings;
  ollama: OllamaSettings;
};

const PROVIDER_ALIASES: Record<string, ProviderName> = {
  hosted: 'gemini',
  gemini: 'gemini',
  local: 'ollama',
  ollama: 'ollama',
};

@Injectable()
export class EvaluationConfigService {
  constructor(private readonly configService: ConfigService) {}

  resolveRuntimeConfig(): EvaluationRuntimeConfig {
    return {
      provider: this.resolveProvider(),
      temperature: this.readNumber('EVALUATION_TEMPERATURE', 0.3),
      gemini: {
        apiKey: this.readText('GEMINI_API_KEY') || undefined,
        model: this.readText('GEMINI_MODEL') || 'gemini-2.5-flash-lite',
        timeoutMs: this.readNumber('GEMINI_TIMEOUT_MS', 180000),
      },
      ollama: {
        baseUrl: (this.readText('OLLAMA_BASE_URL') || 'http://localhost:11434').replace(/\/+$/, ''),
        model: this.readText('OLLAMA_MODEL') || 'deepseek-r1:8b',
        timeoutMs: this.readNumber('OLLAMA_TIMEOUT_MS', 120000),
        healthTimeoutMs: this.readNumber('OLLAMA_HEALTH_TIMEOUT_MS', 5000),
      },
    };
  }

  private resolveProvider(): ProviderName {
    const value = this.readText('EVALUATION_PROVIDER').toLowerCase() || 'hosted';
    const provider = PROVIDER_ALIASES[value];
    if (!provider) {
      throw new Error(`Unknown EVALUATION_PROVIDER "${value}"; expected hosted or local`);
    }
    return provider;
  }

  private readText(key: string): string {
    return this.configService.get<string>(key)?.trim() ?? '';
  }

  private readNumber(key: string, fallback: number): number {
    const raw = this.readText(key);
    const value = raw ? Number(raw) : Number.NaN;
    return Number.isFinite(value) && value >= 0 ? value : fallback;
  }
}
