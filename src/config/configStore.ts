import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import ini from 'ini';
import { z } from 'zod';
import type { AiProvider, Configuration } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'config.ini';

type Section = Record<string, string>;

export const PROVIDERS: Record<AiProvider, { section: string; defaultModel: string }> = {
  openai: { section: 'OpenAI', defaultModel: 'gpt-4o-mini' },
  openrouter: { section: 'OpenRouter', defaultModel: 'anthropic/claude-3.5-sonnet' },
  anthropic: { section: 'Anthropic', defaultModel: 'claude-3-haiku-20240307' },
  gemini: { section: 'Gemini', defaultModel: 'gemini-2.5-flash' },
};

const providerSchema = z.enum(['openai', 'openrouter', 'anthropic', 'gemini']);

const intField = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      const parsed = /^\d+$/.test(value) ? Number(value) : NaN;
      if (!Number.isSafeInteger(parsed) || parsed < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be a whole number >= ${min}` });
        return z.NEVER;
      }
      return parsed;
    });

const boolField = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      const normalized = value.toLowerCase();
      if (['true', 'yes', 'on', '1'].includes(normalized)) return true;
      if (['false', 'no', 'off', '0'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be true or false' });
      return z.NEVER;
    });

const textField = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : value));

const aiSchema = z.object({
  provider: textField('openai').pipe(providerSchema),
  timeout_seconds: intField(60, 1),
});

const credentialsSchema = (defaultModel: string) =>
  z.object({
    api_key: z.string(),
    model: textField(defaultModel),
  });

const wordpressSchema = z.object({
  site_url: z
    .string()
    .url('must be an absolute URL')
    .transform((url) => url.replace(/\/+$/, '')),
  username: z.string(),
  app_password: z.string(),
  timeout_seconds: intField(30, 1),
});

const keywordsSchema = z.object({
  file: textField('keywords.txt'),
});

const contentSchema = z.object({
  posts_per_run: intField(1, 1),
  min_words: intField(800, 1),
  max_words: intField(1500, 1),
  target_category: textField(''),
  post_status: textField('draft').pipe(z.enum(['draft', 'publish', 'pending', 'private'])),
  language: textField('English'),
  stop_on_error: boolField(false),
  review: boolField(false),
  delay_seconds: intField(30, 0),
});

const ctaSchema = z.object({
  url: textField('').pipe(z.union([z.literal(''), z.string().url('must be an absolute URL')])),
  text: textField('Learn more'),
});

/**
 * Loads and validates the INI run configuration.
 *
 * Checks run in a fixed order (file, parse, sections, required fields, value
 * types, word bounds) and the first failing stage throws a ConfigError that
 * lists every problem found at that stage.
 */
export const loadConfig = (path: string): Configuration => {
  if (!existsSync(path)) {
    throw new ConfigError(`Configuration file not found: ${path}`);
  }

  let document: Record<string, unknown>;
  try {
    document = ini.parse(escapeInlineMarkers(readFileSync(path, 'utf8')));
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} could not be read: ${errorMessage(error)}`, { cause: error });
  }

  const sectionNames = Object.keys(document).filter((name) => readSection(document, name) !== undefined);
  if (sectionNames.length === 0) {
    throw new ConfigError(`Configuration file ${path} is malformed: no [Section] headers found`);
  }

  const aiRaw = readSection(document, 'AI') ?? {};
  const providerResult = providerSchema.safeParse(aiRaw.provider || 'openai');
  if (!providerResult.success) {
    throw new ConfigError(
      `Invalid value for [AI] provider: expected one of ${providerSchema.options.join(', ')}, got "${aiRaw.provider}"`
    );
  }
  const { section: providerSection, defaultModel } = PROVIDERS[providerResult.data];

  const missingSections = [providerSection, 'WordPress'].filter((name) => !readSection(document, name));
  if (missingSections.length > 0) {
    throw new ConfigError(`Missing configuration section(s): ${missingSections.map((name) => `[${name}]`).join(', ')}`);
  }
  const credentialsRaw = readSection(document, providerSection) ?? {};
  const wordpressRaw = readSection(document, 'WordPress') ?? {};

  const required: Array<[string, Section, string]> = [
    [providerSection, credentialsRaw, 'api_key'],
    ['WordPress', wordpressRaw, 'site_url'],
    ['WordPress', wordpressRaw, 'username'],
    ['WordPress', wordpressRaw, 'app_password'],
  ];
  const missingFields = required
    .filter(([, section, key]) => !section[key])
    .map(([name, , key]) => `[${name}] ${key}`);
  if (missingFields.length > 0) {
    throw new ConfigError(`Missing required configuration value(s): ${missingFields.join(', ')}`);
  }

  const issues: string[] = [];
  const parse = <T extends z.ZodTypeAny>(schema: T, name: string, raw: Section): z.output<T> | undefined => {
    const result = schema.safeParse(raw);
    if (result.success) return result.data;
    for (const issue of result.error.issues) {
      issues.push(`Invalid value for [${name}] ${issue.path.join('.')}: ${issue.message}`);
    }
    return undefined;
  };

  const ai = parse(aiSchema, 'AI', aiRaw);
  const credentials = parse(credentialsSchema(defaultModel), providerSection, credentialsRaw);
  const wordpress = parse(wordpressSchema, 'WordPress', wordpressRaw);
  const keywords = parse(keywordsSchema, 'Keywords', readSection(document, 'Keywords') ?? {});
  const content = parse(contentSchema, 'Content', readSection(document, 'Content') ?? {});
  const cta = parse(ctaSchema, 'CTA', readSection(document, 'CTA') ?? {});

  if (!ai || !credentials || !wordpress || !keywords || !content || !cta) {
    throw new ConfigError(issues.join('; '));
  }

  if (content.min_words > content.max_words) {
    throw new ConfigError(
      `[Content] min_words (${content.min_words}) must not exceed max_words (${content.max_words})`
    );
  }

  return Object.freeze({
    ai: Object.freeze({
      provider: ai.provider,
      apiKey: credentials.api_key,
      model: credentials.model,
      timeoutMs: ai.timeout_seconds * 1000,
    }),
    wordpress: Object.freeze({
      siteUrl: wordpress.site_url,
      username: wordpress.username,
      appPassword: wordpress.app_password,
      timeoutMs: wordpress.timeout_seconds * 1000,
    }),
    keywords: Object.freeze({
      file: resolve(dirname(path), keywords.file),
    }),
    content: Object.freeze({
      postsPerRun: content.posts_per_run,
      minWords: content.min_words,
      maxWords: content.max_words,
      targetCategory: content.target_category,
      postStatus: content.post_status,
      language: content.language,
      stopOnError: content.stop_on_error,
      review: content.review,
      delaySeconds: content.delay_seconds,
    }),
    cta: Object.freeze({
      url: cta.url,
      text: cta.text,
    }),
  });
};

/**
 * Returns a copy of `config` with a different posts-per-run count
 * (the `--posts` command-line override).
 */
export const withPostsPerRun = (config: Configuration, postsPerRun: number): Configuration =>
  Object.freeze({ ...config, content: Object.freeze({ ...config.content, postsPerRun }) });

/**
 * Only whole lines are comments: `;` and `#` inside an unquoted
 * value are escaped so the ini parser keeps them
 * (`url = https://shop.test/plans#pro`).
 */
export const escapeInlineMarkers = (text: string): string =>
  text
    .split(/\r?\n/)
    .map((line) => {
      const match = /^(\s*[^\s;#[][^=]*=)(.*)$/.exec(line);
      if (!match) return line;
      const [, key = '', value = ''] = match;
      if (/^\s*(["']).*\1\s*$/.test(value)) return line;
      return key + value.replace(/(?<!\\)[;#]/g, '\\$&');
    })
    .join('\n');

// Section names match case-insensitively; keys are lower-cased and values
// trimmed. The ini parser turns bare true/false into booleans, so those are
// turned back into strings here.
const readSection = (document: Record<string, unknown>, name: string): Section | undefined => {
  const key = Object.keys(document).find((candidate) => candidate.toLowerCase() === name.toLowerCase());
  const value = key === undefined ? undefined : document[key];
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }

  const section: Section = {};
  for (const [field, raw] of Object.entries(value)) {
    if (typeof raw === 'string') section[field.toLowerCase()] = raw.trim();
    else if (typeof raw === 'boolean') section[field.toLowerCase()] = String(raw);
  }
  return section;
};
