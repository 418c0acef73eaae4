import { vi } from 'vitest';
import type { FetchFn } from '../openai-client';
import type { ServerConfig } from '../config';

export interface RecordedRequest {
  url: string;
  init?: RequestInit;
  body: Record<string, unknown>;
}

/**
 * fetch stand-in answering with queued responses in order. A queued Error is
 * thrown instead, as fetch does on network failures.
 */
export function createFakeFetch(responses: Array<Response | Error>) {
  const requests: RecordedRequest[] = [];
  const queue = [...responses];

  const fetch: FetchFn = vi.fn(async (url: string, init?: RequestInit) => {
    const body: Record<string, unknown> =
      typeof init?.body === 'string' ? JSON.parse(init.body) : {};
    requests.push({ url, init, body });

    const next = queue.shift();
    if (!next) {
      throw new Error('No fake response queued');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });

  return { fetch, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status: number): Response {
  return new Response(text, { status });
}

export function completion(content: string, id = 'chatcmpl-test'): Response {
  return jsonResponse({
    id,
    choices: [{ index: 0, message: { role: 'assistant', content } }],
  });
}

export function streamResponse(events: string[]): Response {
  return new Response(events.map((data) => `data: ${data}\n\n`).join(''), {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

export function deltaChunk(content: string): string {
  return JSON.stringify({ choices: [{ index: 0, delta: { content } }] });
}

export const testConfig: ServerConfig = {
  inkeepApiKey: 'test-secret',
  host: '127.0.0.1',
  port: 0,
  logLevel: 'INFO',
};
