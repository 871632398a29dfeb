/**
 * Language-model tool - structured and free-text completions via OpenAI
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { Config } from '../config';
import { MalformedResponseError } from '../errors';
import { Logger } from '../utils';

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * One call, no retries. Callers wrap each call site in their own RetryPolicy.
 */
export interface LanguageModel {
  generateStructured<T>(prompt: string, schema: z.ZodType<T>, options?: GenerateOptions): Promise<T>;
  generateText(prompt: string, options?: GenerateOptions): Promise<string>;
}

/**
 * Parse a JSON completion against the result schema, turning every way it can
 * go wrong into a MalformedResponseError.
 */
export function parseStructured<T>(content: string | null | undefined, schema: z.ZodType<T>): T {
  if (!content || !content.trim()) {
    throw new MalformedResponseError('Model returned an empty structured response');
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new MalformedResponseError('Model response is not valid JSON', { cause: error });
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new MalformedResponseError(`Model response does not match the result schema (${issues.join('; ')})`);
  }
  return result.data;
}

export interface OpenAiLanguageModelOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  client?: OpenAI;
}

export class OpenAiLanguageModel implements LanguageModel {
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAiLanguageModelOptions = {}) {
    this.model = options.model ?? Config.LLM_MODEL;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey ?? Config.OPENAI_API_KEY,
        timeout: options.timeoutMs ?? Config.LLM_TIMEOUT_MS,
        maxRetries: 0,
      });
  }

  async generateStructured<T>(prompt: string, schema: z.ZodType<T>, options: GenerateOptions = {}): Promise<T> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: 'Respond with a single JSON object and nothing else.' },
        { role: 'user', content: prompt },
      ],
      temperature: options.temperature,
      max_tokens: options.maxTokens,
      response_format: { type: 'json_object' },
    });

    Logger.debug('Structured completion received', {
      model: this.model,
      total_tokens: completion.usage?.total_tokens,
    });

    return parseStructured(completion.choices[0]?.message?.content, schema);
  }

  async generateText(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    });

    const text = completion.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new MalformedResponseError('Model returned an empty text response');
    }
    return text;
  }
}
