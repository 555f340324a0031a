import { Injectable } from '@nestjs/common';
import { GoogleGenAI, type GenerateContentParameters } from '@google/genai';

/** The slice of the Gemini SDK the hosted provider calls. */
export interface GeminiTextClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export type GeminiClientOptions = {
  apiKey: string;
  timeoutMs: number;
};

@Injectable()
export class GeminiClientFactory {
  create(options: GeminiClientOptions): GeminiTextClient {
    const ai = new GoogleGenAI({ apiKey: options.apiKey, httpOptions: { timeout: options.timeoutMs } });
    return ai.models;
  }
}
