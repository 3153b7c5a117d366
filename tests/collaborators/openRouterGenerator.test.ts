import { describe, it, expect } from 'vitest';
import { OpenRouterGenerator, cleanGeneratedText, type FetchLike } from '../../src/collaborators/openRouterGenerator.js';
import { SYSTEM_PROMPTS, buildPrompt } from '../../src/collaborators/prompts.js';
import { candidate } from '../helpers/fakes.js';

interface Captured {
  url: string;
  init: RequestInit;
}

function fakeFetch(respond: () => Response | Promise<Response>, captured: Captured[] = []): FetchLike {
  return async (url, init) => {
    captured.push({ url, init });
    return respond();
  };
}

function completion(content: string | null): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

describe('OpenRouterGenerator', () => {
  it('posts a chat completion with the system prompt for the kind', async () => {
    const captured: Captured[] = [];
    const generator = new OpenRouterGenerator({
      apiKey: 'test-secret',
      model: 'test/model',
      fetch: fakeFetch(() => completion('Sharding by tenant kept the hot rows apart.'), captured),
    });

    const result = await generator.generate('the prompt', 'reply');

    expect(result).toEqual({ text: 'Sharding by tenant kept the hot rows apart.', error: null });
    expect(captured).toHaveLength(1);
    expect(captured[0]?.url).toBe('https://openrouter.ai/api/v1/chat/completions');
    const headers = new Headers(captured[0]?.init.headers);
    expect(headers.get('Authorization')).toBe('Bearer test-secret');
    const body: unknown = JSON.parse(String(captured[0]?.init.body));
    expect(body).toMatchObject({
      model: 'test/model',
      messages: [
        { role: 'system', content: SYSTEM_PROMPTS.reply },
        { role: 'user', content: 'the prompt' },
      ],
    });
  });

  it('strips wrapping quotes from the completion', async () => {
    const generator = new OpenRouterGenerator({
      apiKey: 'test-secret',
      fetch: fakeFetch(() => completion('  "Cold starts dominate at this size."  ')),
    });
    expect((await generator.generate('p', 'post')).text).toBe('Cold starts dominate at this size.');
  });

  it('maps HTTP errors to an error result', async () => {
    const generator = new OpenRouterGenerator({
      apiKey: 'test-secret',
      fetch: fakeFetch(() => new Response('rate limited', { status: 429 })),
    });
    expect(await generator.generate('p', 'reply')).toEqual({ text: null, error: 'OpenRouter API 429: rate limited' });
    expect(generator.getStats()).toEqual({ generated: 0, failed: 1 });
  });

  it('maps network failures to an error result', async () => {
    const generator = new OpenRouterGenerator({
      apiKey: 'test-secret',
      fetch: fakeFetch(() => { throw new Error('socket hang up'); }),
    });
    expect(await generator.generate('p', 'reply')).toEqual({ text: null, error: 'socket hang up' });
  });

  it('reports missing and blank content', async () => {
    const missing = new OpenRouterGenerator({ apiKey: 'test-secret', fetch: fakeFetch(() => completion(null)) });
    expect(await missing.generate('p', 'reply')).toEqual({ text: null, error: 'Empty LLM response' });

    const blank = new OpenRouterGenerator({ apiKey: 'test-secret', fetch: fakeFetch(() => completion('""')) });
    expect(await blank.generate('p', 'reply')).toEqual({ text: null, error: 'Empty generation' });
  });
});

describe('cleanGeneratedText', () => {
  it('leaves inner quotes alone', () => {
    expect(cleanGeneratedText('He said "no" twice')).toBe('He said "no" twice');
  });
});

describe('buildPrompt', () => {
  it('includes the author and post text', () => {
    const prompt = buildPrompt(candidate('c1', 'alice', 'Postgres 17 ships incremental backup'), 'reply');
    expect(prompt).toContain('@alice');
    expect(prompt).toContain('"Postgres 17 ships incremental backup"');
  });

  it('falls back when the author is unknown', () => {
    expect(buildPrompt(candidate('c1', ''), 'like')).toBe('Post by unknown author:\n"post c1"');
  });
});
