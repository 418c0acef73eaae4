/**
 * docs_chat Tool
 *
 * Answers Deephaven documentation questions through the Inkeep
 * OpenAI-compatible API.
 */

import { z } from 'zod';
import { createScopedLogger, DocsMcpError } from '@docs-mcp/shared';
import { INKEEP_BASE_URL, INKEEP_MODEL } from '../config';
import { OpenAIClient, type ChatMessage } from '../openai-client';
import {
  buildSystemPrompts,
  isSupportedLanguage,
  SUPPORTED_LANGUAGES,
  type WorkerEnvironment,
} from '../prompts';
import type { Tool, ToolContext, ToolResult } from './types';

const log = createScopedLogger('docs_chat');

export const DOCS_CHAT_REQUEST_OPTIONS = {
  max_tokens: 1500,
  temperature: 0.1,
  top_p: 0.9,
  presence_penalty: 0.1,
};

export type DocsChatResult =
  | { success: true; response: string }
  | { success: false; error: string; isError: true };

const argsSchema = z.object({
  prompt: z.string().min(1, 'prompt must be a non-empty string'),
  // Shape is checked by the client so its messages reach the caller
  history: z.unknown().optional(),
  deephaven_core_version: z.string().nullish(),
  deephaven_enterprise_version: z.string().nullish(),
  programming_language: z.string().nullish(),
});

export type DocsChatArgs = z.infer<typeof argsSchema>;

export class InvalidArgumentError extends DocsMcpError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
  }
}

// e.g. "OpenAIClientError: <message>"
function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

function resolveWorker(args: DocsChatArgs): WorkerEnvironment {
  const worker: WorkerEnvironment = {
    coreVersion: args.deephaven_core_version ?? undefined,
    enterpriseVersion: args.deephaven_enterprise_version ?? undefined,
  };

  // null and empty mean "not given"
  if (args.programming_language) {
    const language = args.programming_language.trim().toLowerCase();
    if (!isSupportedLanguage(language)) {
      throw new InvalidArgumentError(
        `Unsupported programming language: ${language}. Supported languages are: ${SUPPORTED_LANGUAGES.join(', ')}.`
      );
    }
    worker.language = language;
  }

  return worker;
}

/**
 * Run one docs_chat request. Failures are returned, never thrown.
 */
export async function docsChat(
  rawArgs: Record<string, unknown>,
  context: ToolContext
): Promise<DocsChatResult> {
  try {
    const parsed = argsSchema.safeParse(rawArgs);
    if (!parsed.success) {
      throw new InvalidArgumentError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    const args = parsed.data;
    const systemPrompts = buildSystemPrompts(resolveWorker(args));

    const client = new OpenAIClient({
      apiKey: context.config.inkeepApiKey,
      baseUrl: INKEEP_BASE_URL,
      model: INKEEP_MODEL,
      timeoutMs: 300_000,
      maxRetries: 1,
      fetch: context.fetch,
    });

    client.validateHistory(args.history);
    const history = Array.isArray(args.history) ? args.history.filter(isChatMessage) : undefined;

    log.info('Answering documentation question', {
      promptLength: args.prompt.length,
      historyLength: history?.length ?? 0,
      language: args.programming_language,
    });

    const response = await client.chat(
      args.prompt,
      history,
      systemPrompts,
      DOCS_CHAT_REQUEST_OPTIONS
    );
    return { success: true, response };
  } catch (error) {
    log.error('docs_chat failed', error);
    return { success: false, error: describeError(error), isError: true };
  }
}

function isChatMessage(value: unknown): value is ChatMessage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'role' in value &&
    'content' in value &&
    typeof value.role === 'string' &&
    typeof value.content === 'string'
  );
}

export const docsChatTool: Tool = {
  definition: {
    name: 'docs_chat',
    description:
      'Ask the Deephaven documentation assistant a question in natural language. Pass earlier turns as history for follow-up questions, and the worker versions and language for environment-specific answers.',
    inputSchema: {
      type: 'object',
      properties: {
        prompt: {
          type: 'string',
          description: 'The question for the documentation assistant',
        },
        history: {
          type: 'array',
          description: 'Previous chat messages, each with "role" ("user" or "assistant") and "content"',
          items: {
            type: 'object',
            properties: {
              role: { type: 'string' },
              content: { type: 'string' },
            },
            required: ['role', 'content'],
          },
        },
        deephaven_core_version: {
          type: 'string',
          description: 'Deephaven Community Core version of the worker (e.g., "0.39.0")',
        },
        deephaven_enterprise_version: {
          type: 'string',
          description: 'Deephaven Core+ (Enterprise) version of the worker',
        },
        programming_language: {
          type: 'string',
          description: 'Programming language of the worker: python or groovy (case-insensitive)',
        },
      },
      required: ['prompt'],
    },
  },
  handler: async (args, context): Promise<ToolResult> => {
    const result = await docsChat(args, context);
    return {
      content: [{ type: 'text', text: JSON.stringify(result) }],
      ...(result.success ? {} : { isError: true }),
    };
  },
};
