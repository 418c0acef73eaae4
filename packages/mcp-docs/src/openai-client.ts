/**
 * Client for OpenAI-compatible chat completion APIs
 *
 * Speaks the `/chat/completions` wire format directly over fetch, so any
 * compatible endpoint (Inkeep included) can be targeted by base URL.
 */

import { createScopedLogger, errorMessage, DocsMcpError } from '@docs-mcp/shared';

const log = createScopedLogger('OpenAIClient');

export class OpenAIClientError extends DocsMcpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'OPENAI_CLIENT_ERROR', options);
  }
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole | string;
  content: string;
}

/** Extra request fields, e.g. max_tokens, temperature, top_p */
export type ChatRequestOptions = Record<string, unknown>;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  /** Default system prompt, used when a call passes none of its own */
  systemPrompt?: string;
  /** Whole-request timeout (default: 300000) */
  timeoutMs?: number;
  /** Retries on network errors, 429 and 5xx (default: 1) */
  maxRetries?: number;
  fetch?: FetchFn;
}

class RetryableError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `choices[0][field].content` when it is a string
 */
function firstChoiceContent(body: unknown, field: 'message' | 'delta'): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) return undefined;
  const choice: unknown = body.choices[0];
  if (!isRecord(choice)) return undefined;
  const part = choice[field];
  if (!isRecord(part)) return undefined;
  return typeof part.content === 'string' ? part.content : undefined;
}

export class OpenAIClient {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  readonly systemPrompt?: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly fetchFn: FetchFn;

  constructor(options: OpenAIClientOptions) {
    if (!options.apiKey) {
      throw new OpenAIClientError('apiKey must be a non-empty string.');
    }
    if (!options.baseUrl) {
      throw new OpenAIClientError('baseUrl must be a non-empty string.');
    }
    if (!options.model) {
      throw new OpenAIClientError('model must be a non-empty string.');
    }

    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.systemPrompt = options.systemPrompt;
    this.timeoutMs = options.timeoutMs ?? 300_000;
    this.maxRetries = options.maxRetries ?? 1;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Check that history is a list of `{ role, content }` string pairs
   */
  validateHistory(history: unknown): void {
    if (history === undefined || history === null) return;

    if (!Array.isArray(history)) {
      throw new OpenAIClientError('history must be an array of messages');
    }
    for (const message of history) {
      if (!isRecord(message)) {
        throw new OpenAIClientError('Each message in history must be an object');
      }
      if (!('role' in message) || !('content' in message)) {
        throw new OpenAIClientError("Each message in history must have 'role' and 'content' keys");
      }
      if (typeof message.role !== 'string' || typeof message.content !== 'string') {
        throw new OpenAIClientError("'role' and 'content' in each message must be strings");
      }
    }
  }

  /**
   * System prompts first, then history, then the prompt as the user turn.
   * `systemPrompts` replaces the default system prompt when given.
   */
  buildMessages(
    prompt: string,
    history?: readonly ChatMessage[] | null,
    systemPrompts?: readonly string[]
  ): ChatMessage[] {
    const messages: ChatMessage[] = [];

    const prompts = systemPrompts ?? (this.systemPrompt ? [this.systemPrompt] : []);
    for (const content of prompts) {
      messages.push({ role: 'system', content });
    }
    if (history) {
      messages.push(...history);
    }
    messages.push({ role: 'user', content: prompt });
    return messages;
  }

  /**
   * Send a chat completion and return the assistant message, trimmed
   */
  async chat(
    prompt: string,
    history?: readonly ChatMessage[] | null,
    systemPrompts?: readonly string[],
    options: ChatRequestOptions = {}
  ): Promise<string> {
    this.validateHistory(history);
    const messages = this.buildMessages(prompt, history, systemPrompts);

    log.info('Sending chat completion request', {
      model: this.model,
      baseUrl: this.baseUrl,
      promptLength: prompt.length,
      historyLength: history?.length ?? 0,
    });
    const start = Date.now();

    const response = await this.post({ ...options, model: this.model, messages });
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new OpenAIClientError(`Invalid JSON in response: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const content = firstChoiceContent(body, 'message');
    if (content === undefined) {
      log.error('Unexpected response structure', body);
      throw new OpenAIClientError('Unexpected response structure from OpenAI API');
    }

    log.info('Chat completion succeeded', {
      requestId: isRecord(body) ? body.id : undefined,
      elapsedMs: Date.now() - start,
    });
    return content.trim();
  }

  /**
   * Stream a chat completion, yielding content chunks as they arrive
   */
  async *streamChat(
    prompt: string,
    history?: readonly ChatMessage[] | null,
    systemPrompts?: readonly string[],
    options: ChatRequestOptions = {}
  ): AsyncGenerator<string, void, undefined> {
    this.validateHistory(history);
    const messages = this.buildMessages(prompt, history, systemPrompts);

    log.info('Sending streaming chat request', {
      model: this.model,
      promptLength: prompt.length,
      historyLength: history?.length ?? 0,
    });
    const start = Date.now();

    const response = await this.post({ ...options, model: this.model, messages, stream: true });
    if (!response.body) {
      throw new OpenAIClientError('Streaming response has no body');
    }

    let yielded = false;
    try {
      for await (const data of readServerSentEvents(response.body)) {
        if (data === '[DONE]') break;

        let chunk: unknown;
        try {
          chunk = JSON.parse(data);
        } catch {
          log.warn('Skipping malformed stream chunk', { data });
          continue;
        }

        const content = firstChoiceContent(chunk, 'delta');
        if (content) {
          yielded = true;
          yield content;
        }
      }
    } catch (error) {
      if (error instanceof OpenAIClientError) throw error;
      log.error('Streaming call failed', error);
      throw new OpenAIClientError(`OpenAI API streaming call failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!yielded) {
      log.warn('No content yielded in stream');
    }
    log.info('Streaming chat completion finished', { elapsedMs: Date.now() - start });
  }

  /**
   * POST to /chat/completions, retrying transient failures
   */
  private async post(payload: Record<string, unknown>): Promise<Response> {
    const url = `${this.baseUrl}/chat/completions`;
    let attempt = 0;

    for (;;) {
      try {
        const response = await this.fetchFn(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (response.ok) return response;

        const detail = await response.text().catch(() => '');
        const message = `OpenAI API call failed: HTTP ${response.status}${detail ? ` ${detail}` : ''}`;
        if (response.status === 429 || response.status >= 500) {
          throw new RetryableError(message);
        }
        throw new OpenAIClientError(message);
      } catch (error) {
        if (error instanceof OpenAIClientError) {
          log.error(error.message);
          throw error;
        }
        if (attempt < this.maxRetries) {
          attempt++;
          log.warn(`Retrying chat request (${attempt}/${this.maxRetries})`, {
            reason: errorMessage(error),
          });
          continue;
        }
        const message =
          error instanceof RetryableError
            ? error.message
            : `OpenAI API call failed: ${errorMessage(error)}`;
        log.error(message);
        throw new OpenAIClientError(message, { cause: error });
      }
    }
  }
}

/**
 * Yield the `data:` payload of each server-sent event
 */
export async function* readServerSentEvents(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let data: string[] = [];

  try {
    for (;;) {
      const { done, value } = await reader.read();
      buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);

        if (line === '') {
          if (data.length > 0) {
            yield data.join('\n');
            data = [];
          }
        } else if (line.startsWith('data:')) {
          data.push(line.slice(5).trimStart());
        }
        newline = buffer.indexOf('\n');
      }

      if (done) break;
    }

    if (buffer.startsWith('data:')) {
      data.push(buffer.slice(5).trimStart());
    }
    if (data.length > 0) {
      yield data.join('\n');
    }
  } finally {
    reader.releaseLock();
  }
}
