import { ConfigService } from '@nestjs/config';
import { EvaluationConfigService } from '../evaluation-config.service';
import { EvaluationFailedError } from '../evaluation.errors';
import { OllamaProvider } from './ollama.provider';

const speakingInput = {
  questionText: 'Describe your hometown.',
  partNumber: 1 as const,
  transcript: 'My hometown is a small city near the sea.',
};

const chatResponse = (content: string, status = 200) =>
  new Response(JSON.stringify({ model: 'test-model', message: { role: 'assistant', content } }), { status });

const failureReason = async (promise: Promise<unknown>): Promise<string | undefined> => {
  try {
    await promise;
  } catch (error) {
    return error instanceof EvaluationFailedError ? error.reason : 'unexpected';
  }
  return undefined;
};

describe('OllamaProvider', () => {
  let provider: OllamaProvider;
  let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  beforeEach(() => {
    const configService = new ConfigService({
      EVALUATION_PROVIDER: 'local',
      OLLAMA_BASE_URL: 'http://ollama.test/',
      OLLAMA_MODEL: 'test-model',
    });
    provider = new OllamaProvider(new EvaluationConfigService(configService));
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('describes itself with the configured model', () => {
    expect(provider.describe()).toEqual({ providerName: 'ollama', modelName: 'test-model' });
  });

  it('defaults every criterion the model left out', async () => {
    const content = '<think>reasoning</think>\n```json\n{"grammar_score": 6, "grammar_feedback": "ok"}\n```';
    fetchSpy.mockImplementation(async () => chatResponse(content));

    const { result } = await provider.evaluateSpeaking(speakingInput);

    expect(result).toEqual({
      coherence: { score: 0, feedback: '' },
      lexical_resource: { score: 0, feedback: '' },
      grammatical_range: { score: 6, feedback: 'ok' },
      task_response: { score: 0, feedback: '' },
      overall_feedback: '',
    });
  });

  it('normalizes a fenced reply from a reasoning model', async () => {
    const content = [
      '<think>The candidate answered briefly. {draft}</think>',
      '```json',
      JSON.stringify({
        grammar_score: 6,
        grammar_feedback: 'ok',
        vocabulary: 7,
        coherence: { score: 6.5, feedback: 'fine' },
        task_response_score: 7,
        summary: 'Nice',
      }),
      '```',
    ].join('\n');
    fetchSpy.mockImplementation(async () => chatResponse(content));

    const { result, rawResponse } = await provider.evaluateSpeaking(speakingInput);

    expect(result).toEqual({
      coherence: { score: 6.5, feedback: 'fine' },
      lexical_resource: { score: 7, feedback: '' },
      grammatical_range: { score: 6, feedback: 'ok' },
      task_response: { score: 7, feedback: '' },
      overall_feedback: 'Nice',
    });
    expect(rawResponse).toBe(content);
  });

  it('posts one non-streaming JSON chat request', async () => {
    fetchSpy.mockImplementation(async () => chatResponse('{"coherence": 6}'));

    await provider.evaluateSpeaking(speakingInput);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('http://ollama.test/api/chat');
    expect(init?.method).toBe('POST');
    const body = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: 'test-model',
      format: 'json',
      stream: false,
      options: { temperature: 0.3 },
    });
    expect(body.messages[0].role).toBe('system');
    expect(body.messages[0].content).toContain('- "coherence_score": number');
    expect(body.messages[1]).toEqual({
      role: 'user',
      content: expect.stringContaining('My hometown is a small city near the sea.'),
    });
  });

  it('returns enrichment lists for enhanced writing reviews', async () => {
    const content = JSON.stringify({
      task_achievement_score: 6,
      coherence_score: 6,
      lexical_resource_score: 5.5,
      grammatical_range_score: 6,
      overall_feedback: 'Develop your ideas.',
      paragraph_feedback: ['Intro restates the question.'],
    });
    fetchSpy.mockImplementation(async () => chatResponse(content));

    const { result } = await provider.evaluateWritingEnhanced({
      promptText: 'Some people think...',
      essayText: 'In my opinion this is true.',
      taskType: 2,
    });

    expect(result.lexical_resource).toEqual({ score: 5.5, feedback: '' });
    expect(result.paragraph_feedback).toEqual(['Intro restates the question.']);
    expect(result.grammar_corrections).toEqual([]);
  });

  it('maps an aborted request to a timeout', async () => {
    fetchSpy.mockRejectedValue(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
    expect(await failureReason(provider.evaluateSpeaking(speakingInput))).toBe('TIMEOUT');
  });

  it('maps a transport error to an API error', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));
    expect(await failureReason(provider.evaluateSpeaking(speakingInput))).toBe('API_ERROR');
  });

  it('maps a non-2xx status to an API error', async () => {
    fetchSpy.mockImplementation(async () => new Response('model not found', { status: 404 }));
    expect(await failureReason(provider.evaluateSpeaking(speakingInput))).toBe('API_ERROR');
  });

  it('reports an empty message', async () => {
    fetchSpy.mockImplementation(async () => chatResponse('   '));
    expect(await failureReason(provider.evaluateSpeaking(speakingInput))).toBe('EMPTY_RESPONSE');
  });

  it('reports a reply without JSON', async () => {
    fetchSpy.mockImplementation(async () => chatResponse('I am unable to score this.'));
    expect(await failureReason(provider.evaluateSpeaking(speakingInput))).toBe('INVALID_JSON');
  });

  it('reports scores outside the band scale as a schema failure', async () => {
    fetchSpy.mockImplementation(async () => chatResponse('{"coherence_score": 12}'));
    expect(await failureReason(provider.evaluateSpeaking(speakingInput))).toBe('SCHEMA_INVALID');
  });

  describe('healthCheck', () => {
    it('is available when the tags endpoint answers 200', async () => {
      fetchSpy.mockImplementation(async () => new Response('{"models": []}', { status: 200 }));
      await expect(provider.healthCheck()).resolves.toEqual({ available: true });
      expect(fetchSpy.mock.calls[0][0]).toBe('http://ollama.test/api/tags');
    });

    it('reports an unexpected status', async () => {
      fetchSpy.mockImplementation(async () => new Response('', { status: 503 }));
      await expect(provider.healthCheck()).resolves.toEqual({
        available: false,
        reason: 'Ollama responded with status 503',
      });
    });

    it('reports an unreachable server', async () => {
      fetchSpy.mockRejectedValue(new TypeError('fetch failed'));
      await expect(provider.healthCheck()).resolves.toEqual({
        available: false,
        reason: 'Ollama is not reachable at http://ollama.test: fetch failed',
      });
    });
  });
});
