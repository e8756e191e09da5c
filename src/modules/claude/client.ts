import Anthropic from '@anthropic-ai/sdk';
import type { z } from 'zod';
import { getLogger } from '../../utils/logger.js';

const REQUEST_TIMEOUT_MS = 30_000;

export interface StructuredResult<T> {
  data: T;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface ClaudeClientOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  maxTokens?: number;
}

/** Strip the markdown fences models add around JSON despite being told not to. */
export function extractJson(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/```\s*$/, '')
    .trim();
}

export class ClaudeClient {
  private client: Anthropic;
  private log = getLogger();
  readonly model: string;
  private maxTokens: number;

  constructor(options: ClaudeClientOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
      maxRetries: 2,
    });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 512;
  }

  /**
   * Ask for a JSON answer and validate it against `schema`.
   * Throws on transport errors, unparseable JSON and schema mismatches.
   */
  async structured<T>(
    system: string,
    task: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<StructuredResult<T>> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0,
      system,
      messages: [{ role: 'user', content: task }],
    });

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') text += block.text;
    }

    const parsed: unknown = JSON.parse(extractJson(text));
    const data = schema.parse(parsed);

    this.log.debug(
      { model: this.model, tokens: response.usage.input_tokens + response.usage.output_tokens },
      'Structured response received',
    );

    return {
      data,
      model: this.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }
}
