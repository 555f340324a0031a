import type { GenerateContentParameters } from '@google/genai';
import { ConfigService } from '@nestjs/config';
import { EvaluationConfigService } from '../evaluation-config.service';
import { EvaluationFailedError, ProviderUnavailableError } from '../evaluation.errors';
import type { GeminiClientFactory } from './gemini-client.factory';
import { GeminiProvider } from './gemini.provider';

const speakingInput = {
  questionText: 'What do you do in your free time?',
  partNumber: 1 as const,
  transcript: 'I usually read novels and go hiking with friends.',
};

const speakingReply = {
  coherence: { score: 6.7, feedback: 'Ideas are linked with simple connectors.' },
  lexical_resource: { score: 6, feedback: 'Adequate range.' },
  grammatical_range: { score: 6.5, feedback: 'Mostly accurate.' },
  task_response: { score: 7, feedback: 'Answers the question directly.' },
  overall_feedback: 'A clear, relevant answer.',
};

describe('GeminiProvider', () => {
  let generateContent: jest.Mock<Promise<{ text?: string }>, [GenerateContentParameters]>;
  let create: jest.Mock;
  let clientFactory: GeminiClientFactory;

  const buildProvider = (settings: Record<string, string>) =>
    new GeminiProvider(new EvaluationConfigService(new ConfigService(settings)), clientFactory);

  beforeEach(() => {
    generateContent = jest.fn<Promise<{ text?: string }>, [GenerateContentParameters]>();
    create = jest.fn().mockReturnValue({ generateContent });
    clientFactory = { create };
  });

  describe('with an API key', () => {
    let provider: GeminiProvider;

    beforeEach(() => {
      provider = buildProvider({ GEMINI_API_KEY: 'test-secret', GEMINI_MODEL: 'gemini-test' });
    });

    it('is available', async () => {
      expect(provider.describe()).toEqual({ providerName: 'gemini', modelName: 'gemini-test' });
      await expect(provider.healthCheck()).resolves.toEqual({ available: true });
    });

    it('returns the validated evaluation with scores on the half-band scale', async () => {
      const text = JSON.stringify(speakingReply);
      generateContent.mockResolvedValue({ text });

      const { result, rawResponse } = await provider.evaluateSpeaking(speakingInput);

      expect(result.coherence).toEqual({ score: 6.5, feedback: 'Ideas are linked with simple connectors.' });
      expect(result.task_response.score).toBe(7);
      expect(result.overall_feedback).toBe('A clear, relevant answer.');
      expect(rawResponse).toBe(text);
    });

    it('sends the system prompt and response schema', async () => {
      generateContent.mockResolvedValue({ text: JSON.stringify(speakingReply) });

      await provider.evaluateSpeaking(speakingInput);

      const [params] = generateContent.mock.calls[0];
      expect(params.model).toBe('gemini-test');
      expect(params.contents).toEqual(expect.stringContaining('I usually read novels and go hiking with friends.'));
      expect(params.config?.temperature).toBe(0.3);
      expect(params.config?.responseMimeType).toBe('application/json');
      expect(params.config?.systemInstruction).toEqual(expect.stringContaining('IELTS Speaking examiner'));
      expect(params.config?.responseSchema).toMatchObject({
        required: ['coherence', 'lexical_resource', 'grammatical_range', 'task_response', 'overall_feedback'],
      });
    });

    it('creates the SDK client once', async () => {
      generateContent.mockResolvedValue({ text: JSON.stringify(speakingReply) });

      await provider.evaluateSpeaking(speakingInput);
      await provider.evaluateSpeaking(speakingInput);

      expect(create).toHaveBeenCalledTimes(1);
      expect(create).toHaveBeenCalledWith({ apiKey: 'test-secret', timeoutMs: 180000 });
    });

    it('maps a timeout', async () => {
      generateContent.mockRejectedValue(new Error('Request timed out'));
      const error = await provider.evaluateSpeaking(speakingInput).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(EvaluationFailedError);
      expect(error).toMatchObject({ reason: 'TIMEOUT', message: 'Gemini request timed out' });
    });

    it('maps other SDK errors to an API error', async () => {
      generateContent.mockRejectedValue(new Error('quota exceeded'));
      await expect(provider.evaluateSpeaking(speakingInput)).rejects.toMatchObject({
        reason: 'API_ERROR',
        message: 'Gemini API error: quota exceeded',
      });
    });

    it('rejects an empty reply', async () => {
      generateContent.mockResolvedValue({ text: '' });
      await expect(provider.evaluateSpeaking(speakingInput)).rejects.toMatchObject({ reason: 'EMPTY_RESPONSE' });
    });

    it('rejects a reply wrapped in reasoning and prose', async () => {
      const text = `<think>x</think>Sure! Here you go:\n${JSON.stringify(speakingReply)}\nHope this helps`;
      generateContent.mockResolvedValue({ text });
      await expect(provider.evaluateSpeaking(speakingInput)).rejects.toMatchObject({
        reason: 'INVALID_JSON',
        message: 'Gemini response is not valid JSON',
        rawResponse: text,
      });
    });

    it('rejects a fenced reply', async () => {
      generateContent.mockResolvedValue({ text: `\`\`\`json\n${JSON.stringify(speakingReply)}\n\`\`\`` });
      await expect(provider.evaluateSpeaking(speakingInput)).rejects.toMatchObject({ reason: 'INVALID_JSON' });
    });

    it('rejects JSON that is not an object', async () => {
      generateContent.mockResolvedValue({ text: '[1, 2]' });
      await expect(provider.evaluateSpeaking(speakingInput)).rejects.toMatchObject({
        reason: 'INVALID_JSON',
        message: 'Gemini response is not a JSON object',
      });
    });

    it('does not rename loose keys', async () => {
      const text = '{"grammar_score": 6, "overall_feedback": "ok"}';
      generateContent.mockResolvedValue({ text });
      await expect(provider.evaluateSpeaking(speakingInput)).rejects.toMatchObject({
        reason: 'SCHEMA_INVALID',
        rawResponse: text,
      });
    });
  });

  describe('without an API key', () => {
    it('reports itself unavailable and never builds a client', async () => {
      const provider = buildProvider({ GEMINI_MODEL: 'gemini-test' });

      await expect(provider.healthCheck()).resolves.toEqual({
        available: false,
        reason: 'GEMINI_API_KEY is not configured',
      });
      await expect(provider.evaluateWriting({ promptText: 'Q', essayText: 'E', taskType: 2 })).rejects.toBeInstanceOf(
        ProviderUnavailableError,
      );
      expect(create).not.toHaveBeenCalled();
    });
  });
});
