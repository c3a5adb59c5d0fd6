// src/services/generator.ts
// What: Answer generator contract and its OpenAI chat-completions implementation.
// How: Sends the assembled prompt as a single user message with OPENAI_CHAT_MODEL and CHAT_TEMPERATURE under a
//      single-attempt request timeout, so GENERATION_TIMEOUT_MS bounds the whole call. Timeouts, request errors
//      and empty completions all become GenerationFailureError.

import OpenAI, { APIConnectionTimeoutError } from 'openai';
import { GenerationFailureError, errorMessage } from '../errors.js';

export interface Generator {
  generate(prompt: string): Promise<string>;
}

// The slice of the OpenAI client this module uses.
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          temperature?: number;
          messages: Array<{ role: 'system' | 'user'; content: string }>;
        },
        options?: { timeout?: number; maxRetries?: number },
      ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIGeneratorOptions {
  model: string;
  temperature?: number; // default 0.3
  timeoutMs?: number; // default 30s
  apiKey?: string;
  client?: ChatCompletionsClient;
}

export class OpenAIGenerator implements Generator {
  readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly client: ChatCompletionsClient;

  constructor(opts: OpenAIGeneratorOptions) {
    this.model = opts.model;
    this.temperature = opts.temperature ?? 0.3;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey });
  }

  async generate(prompt: string): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: this.temperature,
          messages: [{ role: 'user', content: prompt }],
        },
        { timeout: this.timeoutMs, maxRetries: 0 },
      );
      content = completion.choices?.[0]?.message?.content;
    } catch (err: unknown) {
      if (err instanceof APIConnectionTimeoutError || isTimeout(err)) {
        throw new GenerationFailureError('TIMEOUT', `Generation timed out after ${this.timeoutMs}ms`, err);
      }
      throw new GenerationFailureError('REQUEST_FAILED', `Generation request failed: ${errorMessage(err)}`, err);
    }

    if (typeof content !== 'string' || content.trim().length === 0) {
      throw new GenerationFailureError('EMPTY_RESPONSE', 'Model returned no text');
    }
    return content;
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}
