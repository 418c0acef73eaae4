import { describe, it, expect } from 'vitest';
import { docsChat, docsChatTool } from '../tools/docs-chat';
import { basePrompt, buildSystemPrompts, queryStringPrompt } from '../prompts';
import { completion, createFakeFetch, testConfig, textResponse } from './helpers';

function setup(responses: Array<Response | Error>) {
  const fake = createFakeFetch(responses);
  return { context: { config: testConfig, fetch: fake.fetch }, requests: fake.requests };
}

describe('buildSystemPrompts', () => {
  it('should start with the base and query string prompts', () => {
    expect(buildSystemPrompts()).toEqual([basePrompt, queryStringPrompt]);
  });

  it('should add a line per worker detail', () => {
    expect(
      buildSystemPrompts({ coreVersion: '0.39.0', enterpriseVersion: '20240517', language: 'groovy' }).slice(2)
    ).toEqual([
      'Worker environment: Deephaven Community Core version: 0.39.0',
      'Worker environment: Deephaven Core+ (Enterprise) version: 20240517',
      'Worker environment: Programming language: groovy',
    ]);
  });
});

describe('docsChat', () => {
  it('should answer through the Inkeep endpoint', async () => {
    const { context, requests } = setup([completion(' Use update(). ')]);

    const result = await docsChat({ prompt: 'How do I add a column?' }, context);

    expect(result).toEqual({ success: true, response: 'Use update().' });
    expect(requests[0].url).toBe('https://api.inkeep.com/v1/chat/completions');
    expect(requests[0].body).toMatchObject({
      model: 'inkeep-context-expert',
      max_tokens: 1500,
      temperature: 0.1,
      top_p: 0.9,
      presence_penalty: 0.1,
    });
  });

  it('should send system prompts, history and the prompt in order', async () => {
    const { context, requests } = setup([completion('answer')]);

    await docsChat(
      {
        prompt: 'And in groovy?',
        history: [
          { role: 'user', content: 'How do I filter?' },
          { role: 'assistant', content: 'Use where().' },
        ],
        deephaven_core_version: '0.39.0',
        programming_language: '  Groovy ',
      },
      context
    );

    expect(requests[0].body.messages).toEqual([
      { role: 'system', content: basePrompt },
      { role: 'system', content: queryStringPrompt },
      { role: 'system', content: 'Worker environment: Deephaven Community Core version: 0.39.0' },
      { role: 'system', content: 'Worker environment: Programming language: groovy' },
      { role: 'user', content: 'How do I filter?' },
      { role: 'assistant', content: 'Use where().' },
      { role: 'user', content: 'And in groovy?' },
    ]);
  });

  it('should reject unsupported languages without calling the API', async () => {
    const { context, requests } = setup([completion('unused')]);

    const result = await docsChat({ prompt: 'q', programming_language: 'Rust' }, context);

    expect(result).toEqual({
      success: false,
      error:
        'InvalidArgumentError: Unsupported programming language: rust. Supported languages are: python, groovy.',
      isError: true,
    });
    expect(requests).toHaveLength(0);
  });

  it('should treat null arguments as missing', async () => {
    const { context, requests } = setup([completion('answer')]);

    const result = await docsChat(
      {
        prompt: 'q',
        history: null,
        deephaven_core_version: null,
        deephaven_enterprise_version: null,
        programming_language: null,
      },
      context
    );

    expect(result).toEqual({ success: true, response: 'answer' });
    expect(requests[0].body.messages).toEqual([
      { role: 'system', content: basePrompt },
      { role: 'system', content: queryStringPrompt },
      { role: 'user', content: 'q' },
    ]);
  });

  it('should ignore an empty programming language', async () => {
    const { context, requests } = setup([completion('answer')]);

    const result = await docsChat({ prompt: 'q', programming_language: '' }, context);

    expect(result).toEqual({ success: true, response: 'answer' });
    expect(requests[0].body.messages).toEqual([
      { role: 'system', content: basePrompt },
      { role: 'system', content: queryStringPrompt },
      { role: 'user', content: 'q' },
    ]);
  });

  it('should reject an empty prompt', async () => {
    const { context } = setup([]);

    const result = await docsChat({ prompt: '' }, context);

    expect(result).toEqual({
      success: false,
      error: 'InvalidArgumentError: prompt must be a non-empty string',
      isError: true,
    });
  });

  it('should report malformed history as a client error', async () => {
    const { context, requests } = setup([completion('unused')]);

    const result = await docsChat({ prompt: 'q', history: [{ role: 'user' }] }, context);

    expect(result).toEqual({
      success: false,
      error: "OpenAIClientError: Each message in history must have 'role' and 'content' keys",
      isError: true,
    });
    expect(requests).toHaveLength(0);
  });

  it('should report API failures as a client error', async () => {
    const { context } = setup([textResponse('denied', 401)]);

    const result = await docsChat({ prompt: 'q' }, context);

    expect(result).toEqual({
      success: false,
      error: 'OpenAIClientError: OpenAI API call failed: HTTP 401 denied',
      isError: true,
    });
  });
});

describe('docsChatTool', () => {
  it('should require a prompt', () => {
    expect(docsChatTool.definition.name).toBe('docs_chat');
    expect(docsChatTool.definition.inputSchema.required).toEqual(['prompt']);
  });

  it('should not restrict the language spelling in its schema', () => {
    expect(docsChatTool.definition.inputSchema.properties.programming_language).toEqual({
      type: 'string',
      description: 'Programming language of the worker: python or groovy (case-insensitive)',
    });
  });

  it('should return the result as JSON text', async () => {
    const { context } = setup([completion('answer')]);

    const result = await docsChatTool.handler({ prompt: 'q' }, context);

    expect(result).toEqual({
      content: [{ type: 'text', text: '{"success":true,"response":"answer"}' }],
    });
  });

  it('should flag failures', async () => {
    const { context } = setup([]);

    const result = await docsChatTool.handler({ prompt: 'q', programming_language: 'cobol' }, context);

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content[0].text)).toEqual({
      success: false,
      error:
        'InvalidArgumentError: Unsupported programming language: cobol. Supported languages are: python, groovy.',
      isError: true,
    });
  });
});
