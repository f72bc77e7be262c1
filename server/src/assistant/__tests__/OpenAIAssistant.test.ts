import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAIAssistant, NOT_CONFIGURED, MAX_HISTORY, buildSystemPrompt } from '../OpenAIAssistant.js';
import { APOLOGY } from '../Assistant.js';

function completion(content: string | null): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(respond: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => respond());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function requestBody(init: RequestInit): unknown {
  return JSON.parse(String(init.body));
}

const options = {
  apiKey: 'test-secret',
  model: 'test-model',
  name: 'Iris',
  personality: 'friendly',
  timeoutMs: 1000,
};

describe('OpenAIAssistant', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('asks for configuration without an API key', async () => {
    const fetchMock = stubFetch(() => completion('unused'));
    const assistant = new OpenAIAssistant({ ...options, apiKey: '' });

    expect(await assistant.process('hello')).toBe(NOT_CONFIGURED);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends the system prompt, history and utterance', async () => {
    let turn = 0;
    const fetchMock = stubFetch(() => completion(`Answer ${++turn}`));
    const assistant = new OpenAIAssistant(options);

    expect(await assistant.process('first question')).toBe('Answer 1');
    expect(await assistant.process('second question')).toBe('Answer 2');

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toMatch(/\/chat\/completions$/);
    expect(init.method).toBe('POST');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(requestBody(init)).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: assistant.systemPrompt },
        { role: 'user', content: 'first question' },
        { role: 'assistant', content: 'Answer 1' },
        { role: 'user', content: 'second question' },
      ],
      max_tokens: 150,
      temperature: 0.7,
    });
    expect(assistant.getHistory()).toHaveLength(4);
  });

  it('keeps only the most recent history', async () => {
    stubFetch(() => completion('ok'));
    const assistant = new OpenAIAssistant(options);

    for (let i = 0; i <= 10; i++) {
      await assistant.process(`question ${i}`);
    }

    const history = assistant.getHistory();
    expect(history).toHaveLength(MAX_HISTORY);
    expect(history[0]).toEqual({ role: 'user', content: 'question 1' });
  });

  it('apologizes on an HTTP error', async () => {
    stubFetch(() => new Response('overloaded', { status: 500 }));
    const assistant = new OpenAIAssistant(options);

    expect(await assistant.process('hello')).toBe(APOLOGY);
    expect(assistant.getHistory()).toHaveLength(0);
  });

  it('apologizes when the request fails', async () => {
    stubFetch(() => Promise.reject(new TypeError('fetch failed')));
    const assistant = new OpenAIAssistant(options);

    expect(await assistant.process('hello')).toBe(APOLOGY);
  });

  it('apologizes on an empty or malformed reply', async () => {
    const assistant = new OpenAIAssistant(options);

    stubFetch(() => completion('   '));
    expect(await assistant.process('hello')).toBe(APOLOGY);

    stubFetch(() => new Response(JSON.stringify({ choices: [] })));
    expect(await assistant.process('hello')).toBe(APOLOGY);
  });
});

describe('buildSystemPrompt', () => {
  it('names the assistant and applies the personality', () => {
    const prompt = buildSystemPrompt('Iris', 'jarvis');

    expect(prompt.startsWith('You are Iris, a voice assistant built into smart glasses')).toBe(true);
    expect(prompt).toContain('Tone: refined, British and dryly humorous.');
    expect(prompt).toContain('"sir"');
  });

  it('falls back to the friendly personality', () => {
    expect(buildSystemPrompt('Iris', 'grumpy')).toContain('Tone: warm, friendly and conversational.');
  });
});
