import { z } from 'zod';
import type { Configuration, GeneratedPost, PublishResult, WPCreatePostInput } from '../types/index.js';
import { PublishError, errorMessage, type PublishErrorKind } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { fetchWithTimeout, retryWithBackoff, sleep, TimeoutError, type Sleep } from '../utils/networkUtils.js';

export interface PostPublisher {
  publish(post: GeneratedPost, config: Configuration): Promise<PublishResult>;
}

export interface WordPressClientOptions {
  logger: Logger;
  fetch?: typeof fetch;
  sleep?: Sleep;
  /** Retries after the first attempt for 5xx, 408, 429, timeouts and network errors. */
  maxRetries?: number;
  retryDelayMs?: number;
}

const createdPostSchema = z.object({
  id: z.number().int(),
  link: z.string().default(''),
  status: z.string().optional(),
});

const categorySchema = z.object({ id: z.number().int(), name: z.string() });

const wpErrorSchema = z.object({ message: z.string() });

/**
 * Creates posts through the WordPress REST API (`/wp-json/wp/v2`) using an
 * application password over HTTP Basic auth.
 *
 * Post creation is not idempotent: a retry after a timeout whose request did
 * reach the server creates a second post.
 */
export class WordPressClient implements PostPublisher {
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly categoryIds = new Map<string, number>();

  constructor(options: WordPressClientOptions) {
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async publish(post: GeneratedPost, config: Configuration): Promise<PublishResult> {
    const categoryId = await this.resolveCategoryId(config);

    const body: WPCreatePostInput = {
      title: post.title,
      content: post.content,
      status: config.content.postStatus,
      excerpt: post.metaDescription,
      ...(categoryId !== undefined ? { categories: [categoryId] } : {}),
    };

    this.logger.info(`Publishing "${post.title}" as ${body.status}`);

    let attempts = 0;
    const reply = await retryWithBackoff(
      (attempt) => {
        attempts = attempt;
        return this.request(config, 'POST', '/posts', body);
      },
      {
        maxRetries: this.maxRetries,
        initialDelay: this.retryDelayMs,
        shouldRetry: (error) => error instanceof PublishError && error.retryable,
        onRetry: (error, attempt, delay) =>
          this.logger.warn(`Publish attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delay}ms`),
        sleep: this.sleep,
      }
    );

    const created = createdPostSchema.safeParse(reply);
    if (!created.success) {
      throw new PublishError('invalid_response', 'WordPress accepted the post but returned no post ID');
    }

    const result: PublishResult = {
      id: created.data.id,
      link: created.data.link,
      status: created.data.status ?? body.status,
      attempts,
    };
    this.logger.info(`Created post ${result.id}${result.link ? ` at ${result.link}` : ''}`);
    return result;
  }

  /**
   * Maps `[Content] target_category` to a category ID: numeric values are
   * used as-is, names are searched and created when missing. A failed lookup
   * publishes without a category.
   */
  async resolveCategoryId(config: Configuration): Promise<number | undefined> {
    const name = config.content.targetCategory.trim();
    if (!name) return undefined;
    if (/^\d+$/.test(name)) return Number(name);

    const cached = this.categoryIds.get(name.toLowerCase());
    if (cached !== undefined) return cached;

    try {
      const found = z
        .array(categorySchema)
        .parse(await this.request(config, 'GET', `/categories?search=${encodeURIComponent(name)}&per_page=100`));
      const match = found.find(category => decodeEntities(category.name).toLowerCase() === name.toLowerCase());

      const id = match
        ? match.id
        : categorySchema.parse(await this.request(config, 'POST', '/categories', { name })).id;
      this.logger.info(`${match ? 'Using' : 'Created'} category "${name}" (ID ${id})`);

      this.categoryIds.set(name.toLowerCase(), id);
      return id;
    } catch (error) {
      this.logger.warn(`Could not resolve category "${name}", publishing without it: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async request(config: Configuration, method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const { siteUrl, username, appPassword, timeoutMs } = config.wordpress;
    const url = `${siteUrl}/wp-json/wp/v2${path}`;
    const authBase64 = Buffer.from(`${username}:${appPassword}`).toString('base64');

    let reply: { ok: boolean; status: number; statusText: string; text: string };
    try {
      reply = await fetchWithTimeout(
        this.fetchImpl,
        url,
        {
          method,
          headers: {
            'Content-Type': 'application/json',
            'Accept': 'application/json',
            'Authorization': `Basic ${authBase64}`,
          },
          body: body === undefined ? undefined : JSON.stringify(body),
        },
        timeoutMs,
        async (response) => ({
          ok: response.ok,
          status: response.status,
          statusText: response.statusText,
          text: await response.text(),
        })
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new PublishError('timeout', error.message, { cause: error });
      }
      throw new PublishError('network', `${method} ${url} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!reply.ok) {
      const detail = parseWpErrorMessage(reply.text) ?? (reply.text.slice(0, 300) || reply.statusText);
      throw new PublishError(kindForStatus(reply.status), `WordPress ${method} ${path} failed ${reply.status}: ${detail}`, {
        status: reply.status,
      });
    }

    try {
      return JSON.parse(reply.text);
    } catch (error) {
      throw new PublishError('invalid_response', `WordPress returned a non-JSON body for ${method} ${path}`, {
        status: reply.status,
        cause: error,
      });
    }
  }
}

const kindForStatus = (status: number): PublishErrorKind => {
  if (status === 401 || status === 403) return 'auth';
  if (status === 408) return 'timeout';
  if (status === 429 || status >= 500) return 'server';
  return 'validation';
};

// WordPress REST errors look like { code, message, data: { status } }
const parseWpErrorMessage = (text: string): string | undefined => {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = wpErrorSchema.safeParse(json);
  return parsed.success ? parsed.data.message : undefined;
};

const decodeEntities = (text: string): string =>
  text.replace(/&amp;/g, '&').replace(/&#0?39;/g, "'").replace(/&quot;/g, '"');
