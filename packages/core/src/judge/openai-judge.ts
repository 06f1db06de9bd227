import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { ClassificationError } from '../types/errors.js';
import {
  isRelevanceGrade,
  type Classification,
  type DocumentContent,
  type RelevanceJudge,
} from '../types/judgment.js';
import { SYSTEM_PROMPT, buildRelevancePrompt } from './relevance-prompt.js';

export interface OpenAICompatibleJudgeConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  /** Request timeout in milliseconds. */
  timeout: number;
  temperature: number;
  maxTokens: number;
  maxContentChars: number;
}

const DEFAULT_CONFIG: OpenAICompatibleJudgeConfig = {
  baseUrl: 'https://api.openai.com/v1',
  model: 'gpt-4o-mini',
  timeout: 120_000,
  temperature: 0.1,
  maxTokens: 200,
  maxContentChars: 2000,
};

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

interface OpenAIErrorResponse {
  error?: {
    message?: string;
  };
}

const judgeAnswerSchema = z.object({
  relevance: z.union([
    z.number().int('relevance must be an integer'),
    z
      .string()
      .regex(/^\s*-?\d+\s*$/, 'relevance must be an integer')
      .transform((value) => Number(value)),
  ]),
  reason: z.string().optional(),
});

/**
 * Strip a ```json (or bare ```) fence around a model answer.
 */
export function extractJsonBlock(text: string): string {
  const trimmed = text.trim();
  if (trimmed.includes('```json')) {
    return (trimmed.split('```json')[1] ?? '').split('```')[0]?.trim() ?? '';
  }
  if (trimmed.includes('```')) {
    return (trimmed.split('```')[1] ?? '').trim();
  }
  return trimmed;
}

/**
 * Parse a judge answer of the form {"relevance": 0|1|2, "reason": "..."}.
 */
export function parseJudgeAnswer(text: string): Result<Classification, ClassificationError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonBlock(text));
  } catch {
    return err(new ClassificationError(`Judge answer is not valid JSON: ${text.slice(0, 100)}`));
  }

  const validated = judgeAnswerSchema.safeParse(parsed);
  if (!validated.success) {
    const detail = validated.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    return err(new ClassificationError(`Malformed judge answer: ${detail}`));
  }

  const relevance = validated.data.relevance;
  if (!isRelevanceGrade(relevance)) {
    return err(new ClassificationError(`Invalid relevance value: ${relevance}`));
  }

  return ok({ relevance, reason: validated.data.reason ?? '' });
}

/**
 * LLM relevance judge over any OpenAI-compatible chat completions endpoint.
 * Credentials and endpoint are injected; nothing is read from the environment.
 */
export class OpenAICompatibleJudge implements RelevanceJudge {
  private readonly config: OpenAICompatibleJudgeConfig;

  constructor(config?: Partial<OpenAICompatibleJudgeConfig>) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    merged.baseUrl = merged.baseUrl.replace(/\/+$/, '');
    this.config = merged;
  }

  get currentConfig(): OpenAICompatibleJudgeConfig {
    return { ...this.config };
  }

  async classify(
    query: string,
    document: DocumentContent,
    signal?: AbortSignal,
  ): Promise<Result<Classification, ClassificationError>> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    try {
      const response = await globalThis.fetch(`${this.config.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            {
              role: 'user',
              content: buildRelevancePrompt(query, document, this.config.maxContentChars),
            },
          ],
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        }),
        signal:
          signal !== undefined
            ? AbortSignal.any([signal, AbortSignal.timeout(this.config.timeout)])
            : AbortSignal.timeout(this.config.timeout),
      });

      if (!response.ok) {
        const errorMessage = await this.extractErrorMessage(response);
        return err(
          new ClassificationError(`Judge API returned status ${response.status}: ${errorMessage}`),
        );
      }

      const data = (await response.json()) as ChatCompletionResponse;
      const content = data.choices?.[0]?.message?.content;
      if (typeof content !== 'string' || content.trim().length === 0) {
        return err(new ClassificationError('Judge response has no message content'));
      }

      return parseJudgeAnswer(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';

      if (signal?.aborted === true) {
        return err(new ClassificationError(`Judge request cancelled: ${message}`));
      }

      if (message.includes('TimeoutError') || message.includes('timed out') || message.includes('abort')) {
        return err(
          new ClassificationError(
            `Judge request to ${this.config.baseUrl} timed out after ${this.config.timeout}ms: ${message}`,
          ),
        );
      }

      return err(new ClassificationError(`Judge request failed: ${message}`));
    }
  }

  private async extractErrorMessage(response: Response): Promise<string> {
    try {
      const body = (await response.json()) as OpenAIErrorResponse;
      if (body.error?.message) {
        return body.error.message;
      }
    } catch {
      // Body is not JSON; fall back to statusText
    }
    return response.statusText;
  }
}
