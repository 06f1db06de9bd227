import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAICompatibleJudge, extractJsonBlock, parseJudgeAnswer } from './openai-judge.js';
import { SYSTEM_PROMPT, EMPTY_CONTENT, EMPTY_TITLE, buildRelevancePrompt } from './relevance-prompt.js';
import { ClassificationError } from '../types/errors.js';

const DOCUMENT = { docId: 'd1', title: 'Trail runners', content: 'Lightweight shoes for trail running.' };

function completion(content: string | null): Response {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    json: vi.fn().mockResolvedValue({ choices: [{ message: { content } }] }),
  } as unknown as Response;
}

describe('extractJsonBlock', () => {
  it('should strip a json fence', () => {
    expect(extractJsonBlock('```json\n{"relevance": 1}\n```')).toBe('{"relevance": 1}');
  });

  it('should strip a bare fence', () => {
    expect(extractJsonBlock('```\n{"relevance": 2}\n```')).toBe('{"relevance": 2}');
  });

  it('should return unfenced text trimmed', () => {
    expect(extractJsonBlock('  {"relevance": 0} ')).toBe('{"relevance": 0}');
  });
});

describe('parseJudgeAnswer', () => {
  it('should parse grade and reason', () => {
    const result = parseJudgeAnswer('{"relevance": 2, "reason": "direct answer"}');

    expect(result.isOk() && result.value).toEqual({ relevance: 2, reason: 'direct answer' });
  });

  it('should accept a grade given as a string', () => {
    const result = parseJudgeAnswer('{"relevance": "1"}');

    expect(result.isOk() && result.value).toEqual({ relevance: 1, reason: '' });
  });

  it('should reject a grade outside 0..2', () => {
    const result = parseJudgeAnswer('{"relevance": 5, "reason": "x"}');

    expect(result.isErr() && result.error.message).toBe('Invalid relevance value: 5');
  });

  it('should reject a missing grade', () => {
    const result = parseJudgeAnswer('{"reason": "no grade"}');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message.startsWith('Malformed judge answer: relevance:')).toBe(true);
    }
  });

  it('should reject a null grade rather than reading it as 0', () => {
    expect(parseJudgeAnswer('{"relevance": null}').isErr()).toBe(true);
  });

  it('should reject text that is not JSON', () => {
    const result = parseJudgeAnswer('The document is relevant.');

    expect(result.isErr() && result.error.message).toBe(
      'Judge answer is not valid JSON: The document is relevant.',
    );
  });
});

describe('buildRelevancePrompt', () => {
  it('should include the query, title and truncated content', () => {
    const prompt = buildRelevancePrompt('trail shoes', { docId: 'd', title: 'T', content: 'abcdef' }, 3);

    expect(prompt).toContain('**Query:**\ntrail shoes\n');
    expect(prompt).toContain('**Document title:**\nT\n');
    expect(prompt).toContain('**Document content:**\nabc\n');
  });

  it('should substitute placeholders for empty title and content', () => {
    const prompt = buildRelevancePrompt('q', { docId: 'd', title: '', content: '   ' }, 100);

    expect(prompt).toContain(`**Document title:**\n${EMPTY_TITLE}\n`);
    expect(prompt).toContain(`**Document content:**\n${EMPTY_CONTENT}\n`);
  });
});

describe('OpenAICompatibleJudge', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    globalThis.fetch = vi.fn();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('should use default config values when none provided', () => {
    const judge = new OpenAICompatibleJudge();

    expect(judge.currentConfig).toEqual({
      baseUrl: 'https://api.openai.com/v1',
      model: 'gpt-4o-mini',
      timeout: 120_000,
      temperature: 0.1,
      maxTokens: 200,
      maxContentChars: 2000,
    });
  });

  it('should post a chat completion request and parse the answer', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(
      completion('```json\n{"relevance": 2, "reason": "exact"}\n```'),
    );
    const judge = new OpenAICompatibleJudge({
      baseUrl: 'http://localhost:8000/v1//',
      model: 'judge-model',
      apiKey: 'test-secret',
    });

    const result = await judge.classify('trail shoes', DOCUMENT);

    expect(result.isOk() && result.value).toEqual({ relevance: 2, reason: 'exact' });
    expect(globalThis.fetch).toHaveBeenCalledWith(
      'http://localhost:8000/v1/chat/completions',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      }),
    );

    const init = vi.mocked(globalThis.fetch).mock.calls[0]?.[1];
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toEqual({
      model: 'judge-model',
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildRelevancePrompt('trail shoes', DOCUMENT, 2000) },
      ],
      temperature: 0.1,
      max_tokens: 200,
    });
  });

  it('should omit the Authorization header without an API key', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(completion('{"relevance": 0}'));
    const judge = new OpenAICompatibleJudge();

    await judge.classify('q', DOCUMENT);

    expect(globalThis.fetch).toHaveBeenCalledWith(
      'https://api.openai.com/v1/chat/completions',
      expect.objectContaining({ headers: { 'Content-Type': 'application/json' } }),
    );
  });

  it('should return an error for a non-ok status with the API message', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue({
      ok: false,
      status: 429,
      statusText: 'Too Many Requests',
      json: vi.fn().mockResolvedValue({ error: { message: 'Rate limit reached' } }),
    } as unknown as Response);

    const result = await new OpenAICompatibleJudge().classify('q', DOCUMENT);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ClassificationError);
      expect(result.error.message).toBe('Judge API returned status 429: Rate limit reached');
    }
  });

  it('should fall back to statusText when the error body is not JSON', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue({
      ok: false,
      status: 502,
      statusText: 'Bad Gateway',
      json: vi.fn().mockRejectedValue(new SyntaxError('Unexpected token')),
    } as unknown as Response);

    const result = await new OpenAICompatibleJudge().classify('q', DOCUMENT);

    expect(result.isErr() && result.error.message).toBe('Judge API returned status 502: Bad Gateway');
  });

  it('should return an error when the response has no content', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(completion(null));

    const result = await new OpenAICompatibleJudge().classify('q', DOCUMENT);

    expect(result.isErr() && result.error.message).toBe('Judge response has no message content');
  });

  it('should report a timeout', async () => {
    vi.mocked(globalThis.fetch).mockRejectedValue(new Error('The operation was aborted due to timeout'));

    const result = await new OpenAICompatibleJudge({ timeout: 50 }).classify('q', DOCUMENT);

    expect(result.isErr() && result.error.message).toBe(
      'Judge request to https://api.openai.com/v1 timed out after 50ms: The operation was aborted due to timeout',
    );
  });

  it('should pass the caller signal to fetch and report a cancellation', async () => {
    const controller = new AbortController();
    vi.mocked(globalThis.fetch).mockImplementation((_url, init) => {
      expect(init?.signal?.aborted).toBe(false);
      controller.abort();
      expect(init?.signal?.aborted).toBe(true);
      return Promise.reject(new Error('This operation was aborted'));
    });

    const result = await new OpenAICompatibleJudge().classify('q', DOCUMENT, controller.signal);

    expect(result.isErr() && result.error.message).toBe('Judge request cancelled: This operation was aborted');
  });

  it('should report a network failure', async () => {
    vi.mocked(globalThis.fetch).mockRejectedValue(new Error('ECONNREFUSED'));

    const result = await new OpenAICompatibleJudge().classify('q', DOCUMENT);

    expect(result.isErr() && result.error.message).toBe('Judge request failed: ECONNREFUSED');
  });
});
