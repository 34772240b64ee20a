import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../utils/errors.js';
import { loadConfig, withPostsPerRun } from './configStore.js';

const FULL_CONFIG = `
[AI]
provider = openai
timeout_seconds = 45

[OpenAI]
api_key = test-key
model = gpt-4o

[WordPress]
site_url = https://blog.example.test/
username = editor
app_password = test-password

[Keywords]
file = lists/keywords.txt

[Content]
posts_per_run = 3
min_words = 600
max_words = 900
target_category = Marketing
post_status = publish
language = Portuguese
stop_on_error = true
review = yes
delay_seconds = 5

[CTA]
url = https://example.test/offer
text = Quero Crescer
`;

const MINIMAL_CONFIG = `
[OpenAI]
api_key = test-key

[WordPress]
site_url = https://blog.example.test
username = editor
app_password = test-password
`;

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'seo-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const writeConfig = (text: string): string => {
    const path = join(dir, 'config.ini');
    writeFileSync(path, text, 'utf8');
    return path;
  };

  const loadError = (text: string): ConfigError => {
    try {
      loadConfig(writeConfig(text));
    } catch (error) {
      if (error instanceof ConfigError) return error;
      throw error;
    }
    throw new Error('expected loadConfig to throw');
  };

  it('maps every section into the typed configuration', () => {
    const config = loadConfig(writeConfig(FULL_CONFIG));

    expect(config).toEqual({
      ai: { provider: 'openai', apiKey: 'test-key', model: 'gpt-4o', timeoutMs: 45000 },
      wordpress: {
        siteUrl: 'https://blog.example.test',
        username: 'editor',
        appPassword: 'test-password',
        timeoutMs: 30000,
      },
      keywords: { file: join(dir, 'lists', 'keywords.txt') },
      content: {
        postsPerRun: 3,
        minWords: 600,
        maxWords: 900,
        targetCategory: 'Marketing',
        postStatus: 'publish',
        language: 'Portuguese',
        stopOnError: true,
        review: true,
        delaySeconds: 5,
      },
      cta: { url: 'https://example.test/offer', text: 'Quero Crescer' },
    });
  });

  it('fills defaults for optional sections', () => {
    const config = loadConfig(writeConfig(MINIMAL_CONFIG));

    expect(config.ai).toEqual({ provider: 'openai', apiKey: 'test-key', model: 'gpt-4o-mini', timeoutMs: 60000 });
    expect(config.keywords.file).toBe(join(dir, 'keywords.txt'));
    expect(config.content).toEqual({
      postsPerRun: 1,
      minWords: 800,
      maxWords: 1500,
      targetCategory: '',
      postStatus: 'draft',
      language: 'English',
      stopOnError: false,
      review: false,
      delaySeconds: 30,
    });
    expect(config.cta).toEqual({ url: '', text: 'Learn more' });
  });

  it('reads credentials from the selected provider section', () => {
    const config = loadConfig(
      writeConfig(`
[AI]
provider = anthropic

[Anthropic]
api_key = test-anthropic-key

[WordPress]
site_url = https://blog.example.test
username = editor
app_password = test-password
`)
    );

    expect(config.ai).toEqual({
      provider: 'anthropic',
      apiKey: 'test-anthropic-key',
      model: 'claude-3-haiku-20240307',
      timeoutMs: 60000,
    });
  });

  it('keeps ; and # inside values and treats only whole lines as comments', () => {
    const config = loadConfig(
      writeConfig(`${MINIMAL_CONFIG.replace('test-password', 'test#pass;word')}
; call-to-action
[CTA]
# link target
url = https://shop.test/plans#pro
text = Sign up today; it's free
`)
    );

    expect(config.cta).toEqual({ url: 'https://shop.test/plans#pro', text: "Sign up today; it's free" });
    expect(config.wordpress.appPassword).toBe('test#pass;word');
  });

  it('fails when the file does not exist', () => {
    expect(() => loadConfig(join(dir, 'missing.ini'))).toThrow(ConfigError);
    expect(() => loadConfig(join(dir, 'missing.ini'))).toThrow(/Configuration file not found/);
  });

  it('fails when the file has no sections', () => {
    const error = loadError('just some text\n');

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toMatch(/no \[Section\] headers/);
  });

  it('reports a missing section before missing fields', () => {
    const error = loadError('[OpenAI]\nmodel = gpt-4o\n');

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toBe('Missing configuration section(s): [WordPress]');
  });

  it('lists every missing or empty required field', () => {
    const error = loadError(`
[OpenAI]
api_key =

[WordPress]
site_url = https://blog.example.test
`);

    expect(error.message).toBe(
      'Missing required configuration value(s): [OpenAI] api_key, [WordPress] username, [WordPress] app_password'
    );
  });

  it('requires the section of a non-default provider', () => {
    const error = loadError(`[AI]\nprovider = gemini\n${MINIMAL_CONFIG}`);

    expect(error.message).toBe('Missing configuration section(s): [Gemini]');
  });

  it('rejects an unknown provider', () => {
    const error = loadError(`[AI]\nprovider = llama\n${MINIMAL_CONFIG}`);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toMatch(/Invalid value for \[AI\] provider/);
  });

  it('rejects non-numeric counts', () => {
    const error = loadError(`${MINIMAL_CONFIG}\n[Content]\nposts_per_run = many\n`);

    expect(error.message).toBe('Invalid value for [Content] posts_per_run: must be a whole number >= 1');
  });

  it('rejects min_words greater than max_words', () => {
    const error = loadError(`${MINIMAL_CONFIG}\n[Content]\nmin_words = 2000\nmax_words = 1000\n`);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toBe('[Content] min_words (2000) must not exceed max_words (1000)');
  });

  it('accepts equal word bounds', () => {
    const config = loadConfig(writeConfig(`${MINIMAL_CONFIG}\n[Content]\nmin_words = 1000\nmax_words = 1000\n`));

    expect(config.content.minWords).toBe(1000);
    expect(config.content.maxWords).toBe(1000);
  });
});

describe('withPostsPerRun', () => {
  it('returns a copy with the overridden count', () => {
    const dir = mkdtempSync(join(tmpdir(), 'seo-config-'));
    try {
      const path = join(dir, 'config.ini');
      writeFileSync(path, MINIMAL_CONFIG, 'utf8');
      const config = loadConfig(path);

      const overridden = withPostsPerRun(config, 4);

      expect(overridden.content.postsPerRun).toBe(4);
      expect(overridden.content.minWords).toBe(config.content.minWords);
      expect(config.content.postsPerRun).toBe(1);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
