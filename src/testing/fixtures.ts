import type { CompletionRequest, LanguageModelClient } from '../ai/languageModelClient.js';
import type { Configuration } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export const createTestConfig = (
  overrides: { content?: Partial<Configuration['content']>; cta?: Partial<Configuration['cta']> } = {}
): Configuration => ({
  ai: { provider: 'openai', apiKey: 'test-key', model: 'test-model', timeoutMs: 1000 },
  wordpress: {
    siteUrl: 'https://blog.example.test',
    username: 'editor',
    appPassword: 'test-password',
    timeoutMs: 1000,
  },
  keywords: { file: 'keywords.txt' },
  content: {
    postsPerRun: 1,
    minWords: 100,
    maxWords: 200,
    targetCategory: '',
    postStatus: 'draft',
    language: 'English',
    stopOnError: false,
    review: false,
    delaySeconds: 0,
    ...overrides.content,
  },
  cta: { url: 'https://example.test/offer', text: 'Quero Crescer', ...overrides.cta },
});

export interface MemoryLogger extends Logger {
  lines: string[];
}

export const createMemoryLogger = (tag = 'Test', lines: string[] = []): MemoryLogger => ({
  lines,
  info: (message) => lines.push(`INFO [${tag}] ${message}`),
  warn: (message) => lines.push(`WARN [${tag}] ${message}`),
  error: (message) => lines.push(`ERROR [${tag}] ${message}`),
  child: (childTag) => createMemoryLogger(childTag, lines),
});

/** `n` distinct filler words: "word0 word1 ...". */
export const words = (n: number): string => Array.from({ length: n }, (_, i) => `word${i}`).join(' ');

/** Language model that answers from a fixed script, in order. */
export class ScriptedModel implements LanguageModelClient {
  readonly provider = 'openai' as const;
  readonly model = 'test-model';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next instanceof Error) throw next;
    return next;
  }
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

/** fetch stand-in that replays queued responses and records each request. */
export const createQueuedFetch = (responses: Array<Response | Error>) => {
  const requests: RecordedRequest[] = [];

  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const body = init?.body;
    requests.push({
      url: String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof body === 'string' ? JSON.parse(body) : undefined,
    });
    const next = responses.shift();
    if (next === undefined) throw new Error(`unexpected request to ${String(input)}`);
    if (next instanceof Error) throw next;
    return next;
  };

  return { fetch: fetchImpl, requests };
};

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
