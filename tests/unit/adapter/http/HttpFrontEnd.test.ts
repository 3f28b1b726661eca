import { afterEach, describe, expect, it, vi } from 'vitest';
import { MockAgent } from 'undici';
import { extractGist, HttpFrontEnd, type SummarizeDefaults } from '../../../../src/adapter/http/HttpFrontEnd.js';
import { OpenAICompatibleClient } from '../../../../src/core/llm/openaiClient.js';
import type { LLMClient } from '../../../../src/core/llm/types.js';
import { mockLogger } from '../../../helpers/testIo.js';

const defaults: SummarizeDefaults = {
  model: 'default-model',
  temperature: 0.2,
  maxTokens: 800,
  timeoutSeconds: 15,
};

function fakeClient(response: unknown) {
  const complete = vi.fn<LLMClient['complete']>().mockResolvedValue(response);
  return { complete } satisfies LLMClient;
}

describe('extractGist', () => {
  it('returns the first choice message content', () => {
    expect(extractGist({ choices: [{ message: { content: 'gist' } }] })).toBe('gist');
  });

  it('returns the whole document when there is no usable content', () => {
    const doc = { choices: [{ message: { content: '' } }] };
    expect(extractGist(doc)).toBe(doc);
    expect(extractGist({ choices: [] })).toEqual({ choices: [] });
    expect(extractGist('raw')).toBe('raw');
  });
});

describe('HttpFrontEnd routes', () => {
  it('GET / returns the status descriptor', async () => {
    const frontEnd = new HttpFrontEnd(fakeClient({}), mockLogger, defaults, 'groq-gist');
    const result = await frontEnd.handle({ method: 'GET', path: '/', rawBody: '' });
    expect(result).toEqual({
      status: 200,
      body: {
        service: 'groq-gist',
        status: 'ok',
        message: 'The service is running and listening on the expected port.',
      },
    });
  });

  it('GET /health returns an empty 200', async () => {
    const frontEnd = new HttpFrontEnd(fakeClient({}), mockLogger, defaults);
    expect(await frontEnd.handle({ method: 'GET', path: '/health', rawBody: '' })).toEqual({
      status: 200,
    });
  });

  it('rejects unknown paths and wrong methods', async () => {
    const frontEnd = new HttpFrontEnd(fakeClient({}), mockLogger, defaults);
    expect(await frontEnd.handle({ method: 'GET', path: '/nope', rawBody: '' })).toEqual({
      status: 404,
      body: { error: 'Not found' },
    });
    expect(await frontEnd.handle({ method: 'GET', path: '/summarize', rawBody: '' })).toEqual({
      status: 405,
      body: { error: 'Method not allowed' },
    });
  });
});

describe('POST /summarize', () => {
  it('sends the two-message conversation and returns the gist', async () => {
    const client = fakeClient({ choices: [{ message: { content: 'A short gist.' } }] });
    const frontEnd = new HttpFrontEnd(client, mockLogger, defaults);

    const result = await frontEnd.handle({
      method: 'POST',
      path: '/summarize',
      rawBody: JSON.stringify({ prompt: 'Summarize Y', temperature: 0.5, max_tokens: 100, model: 'other' }),
    });

    expect(result).toEqual({ status: 200, body: { prompt: 'Summarize Y', gist: 'A short gist.' } });
    expect(client.complete).toHaveBeenCalledWith(
      [
        { role: 'system', content: 'You are a concise, professional assistant.' },
        { role: 'user', content: 'Summarize Y' },
      ],
      { model: 'other', temperature: 0.5, maxTokens: 100, timeoutSeconds: 15 },
    );
  });

  it('applies defaults for an empty or unparsable body', async () => {
    const client = fakeClient({ id: 'no-choices' });
    const frontEnd = new HttpFrontEnd(client, mockLogger, defaults);

    const result = await frontEnd.handle({ method: 'POST', path: '/summarize', rawBody: '{not json' });

    expect(result).toEqual({
      status: 200,
      body: { prompt: 'No prompt provided', gist: { id: 'no-choices' } },
    });
    expect(client.complete).toHaveBeenCalledWith(expect.any(Array), {
      model: 'default-model',
      temperature: 0.2,
      maxTokens: 800,
      timeoutSeconds: 15,
    });
  });

  it('returns 400 when fields have the wrong type', async () => {
    const client = fakeClient({});
    const frontEnd = new HttpFrontEnd(client, mockLogger, defaults);

    const result = await frontEnd.handle({
      method: 'POST',
      path: '/summarize',
      rawBody: JSON.stringify({ prompt: 'x', temperature: 'hot' }),
    });

    expect(result.status).toBe(400);
    expect(result.body).toMatchObject({ error: 'Invalid request body' });
    expect(client.complete).not.toHaveBeenCalled();
  });

  it('surfaces an API 401 as a 500 JSON error', async () => {
    const agent = new MockAgent();
    agent.disableNetConnect();
    agent
      .get('https://api.example.test')
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .reply(401, { error: 'invalid api key' });
    const client = new OpenAICompatibleClient(mockLogger, {
      url: 'https://api.example.test/v1/chat/completions',
      apiKey: 'test-key',
      userAgent: 'test',
      trust: { localBundlePath: '/nonexistent.pem' },
      dispatcher: agent,
    });
    const frontEnd = new HttpFrontEnd(client, mockLogger, defaults);

    const result = await frontEnd.handle({
      method: 'POST',
      path: '/summarize',
      rawBody: JSON.stringify({ prompt: 'x' }),
    });

    expect(result).toEqual({
      status: 500,
      body: {
        error: 'Failed to call chat completion API',
        details: 'API error (401): {"error":"invalid api key"}',
      },
    });
    await agent.close();
  });
});

describe('HttpFrontEnd server', () => {
  let frontEnd: HttpFrontEnd | undefined;

  afterEach(async () => {
    await frontEnd?.stop();
    frontEnd = undefined;
  });

  it('serves routes over a loopback socket', async () => {
    frontEnd = new HttpFrontEnd(fakeClient({}), mockLogger, defaults, 'groq-gist');
    const port = await frontEnd.start(0);

    const health = await fetch(`http://127.0.0.1:${port}/health`);
    expect(health.status).toBe(200);
    expect(await health.text()).toBe('');

    const index = await fetch(`http://127.0.0.1:${port}/`);
    expect(index.headers.get('content-type')).toBe('application/json');
    expect(await index.json()).toMatchObject({ service: 'groq-gist', status: 'ok' });
  });
});
