import { z } from 'zod';
import type { CompletionRequest, LanguageModelClient } from '../ai/languageModelClient.js';
import type { Configuration, ContentPlan, GeneratedPost, KeywordTask } from '../types/index.js';
import { GenerationError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { countPhrase, countWords, escapeHtml, extractJson } from '../utils/textUtils.js';
import { SYSTEM_INSTRUCTION, createDraftPrompt, createPlanPrompt, createReviewPrompt } from './prompts.js';

/** One keyword occurrence is expected per this many words (at least one). */
export const WORDS_PER_KEYWORD = 150;

const CTA_CLASS = 'cta-block';
const KEYWORD_SUMMARY_CLASS = 'keyword-summary';
const INSERTED_PARAGRAPH = new RegExp(`<p class="(?:${CTA_CLASS}|${KEYWORD_SUMMARY_CLASS})">[\\s\\S]*?</p>`, 'g');

// Drafts this far outside [min, max] are requested once more.
const FAR_BELOW_RATIO = 0.75;
const FAR_ABOVE_RATIO = 1.25;

const stringList = z
  .array(z.union([z.string(), z.object({ heading: z.string() }).transform(item => item.heading)]))
  .transform(items => items.map(item => item.trim()).filter(Boolean));

// Models drift between key spellings; the first alias present wins.
const PLAN_ALIASES: Record<string, string[]> = {
  sections: ['sections', 'outline', 'subtopics', 'headings'],
  secondaryKeywords: ['secondaryKeywords', 'secondary_keywords', 'keywords'],
  faqs: ['faqs', 'faq', 'questions'],
  metaDescription: ['metaDescription', 'meta_description'],
};

const planSchema = z.preprocess(
  (value) => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
    const source = new Map(Object.entries(value));
    const normalized: Record<string, unknown> = { title: source.get('title') };
    for (const [field, aliases] of Object.entries(PLAN_ALIASES)) {
      const alias = aliases.find(candidate => source.has(candidate));
      normalized[field] = alias === undefined ? undefined : source.get(alias);
    }
    return normalized;
  },
  z.object({
    title: z.string().default(''),
    sections: stringList.pipe(z.array(z.string()).min(1, 'the outline has no sections')),
    secondaryKeywords: stringList.default([]),
    faqs: stringList.default([]),
    metaDescription: z.string().default(''),
  })
);

const draftSchema = z.object({
  title: z.string().default(''),
  content: z.string().trim().min(1, 'the article body is empty'),
});

const reviewSchema = draftSchema.extend({
  metaDescription: z.string().default(''),
});

/**
 * Turns a keyword task into a finished post: outline, full draft, then the
 * local keyword/CTA pass.
 */
export class ContentGenerator {
  constructor(
    private readonly model: LanguageModelClient,
    private readonly logger: Logger
  ) {}

  async plan(task: KeywordTask, config: Configuration): Promise<ContentPlan> {
    const reply = await this.ask('plan', {
      system: SYSTEM_INSTRUCTION,
      prompt: createPlanPrompt(task, config),
      json: true,
    });
    const plan = parseReply('plan', reply, planSchema);

    return {
      keyword: task.keyword,
      title: plan.title.trim() || task.keyword,
      sections: plan.sections,
      secondaryKeywords: plan.secondaryKeywords,
      faqs: plan.faqs,
      metaDescription: plan.metaDescription.trim(),
    };
  }

  async draft(plan: ContentPlan, task: KeywordTask, config: Configuration): Promise<GeneratedPost> {
    const { minWords, maxWords } = config.content;

    let post = await this.requestDraft(plan, task, config);
    if (post.wordCount < minWords * FAR_BELOW_RATIO || post.wordCount > maxWords * FAR_ABOVE_RATIO) {
      this.logger.warn(
        `Draft for "${task.keyword}" has ${post.wordCount} words (expected ${minWords}-${maxWords}), requesting once more`
      );
      post = await this.requestDraft(plan, task, config, { wordCount: post.wordCount });
    }

    if (post.wordCount < minWords || post.wordCount > maxWords) {
      this.logger.warn(
        `Accepting draft for "${task.keyword}" with ${post.wordCount} words, outside ${minWords}-${maxWords}`
      );
    }
    return post;
  }

  /**
   * Optional editorial pass: the model revises the title, body and meta
   * description. Blank fields in the reply keep the draft's values.
   */
  async review(post: GeneratedPost, task: KeywordTask, config: Configuration): Promise<GeneratedPost> {
    const reply = await this.ask('review', {
      system: SYSTEM_INSTRUCTION,
      prompt: createReviewPrompt(post, task, config),
      json: true,
    });
    const revised = parseReply('review', reply, reviewSchema);

    const reviewed: GeneratedPost = {
      ...post,
      title: revised.title.trim() || post.title,
      content: revised.content,
      wordCount: countWords(revised.content),
      metaDescription: revised.metaDescription.trim() || post.metaDescription,
    };
    this.logger.info(`Reviewed "${reviewed.title}": ${post.wordCount} -> ${reviewed.wordCount} words`);
    return reviewed;
  }

  optimize(post: GeneratedPost, task: KeywordTask, config: Configuration): GeneratedPost {
    const optimized = optimizePost(post, task, config);
    if (optimized.content !== post.content) {
      this.logger.info(`Optimized "${post.title}": ${countPhrase(optimized.content, task.keyword)} keyword occurrence(s)`);
    }
    return optimized;
  }

  private async requestDraft(
    plan: ContentPlan,
    task: KeywordTask,
    config: Configuration,
    feedback?: { wordCount: number }
  ): Promise<GeneratedPost> {
    const reply = await this.ask('draft', {
      system: SYSTEM_INSTRUCTION,
      prompt: createDraftPrompt(plan, task, config, feedback),
      json: true,
    });
    const draft = parseReply('draft', reply, draftSchema);

    return {
      title: draft.title.trim() || plan.title,
      content: draft.content,
      keyword: task.keyword,
      wordCount: countWords(draft.content),
      metaDescription: plan.metaDescription,
    };
  }

  private async ask(stage: string, request: CompletionRequest): Promise<string> {
    let reply: string;
    try {
      reply = await this.model.complete(request);
    } catch (error) {
      throw new GenerationError(`${stage} request to ${this.model.provider} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!reply.trim()) {
      throw new GenerationError(`${stage} request to ${this.model.provider} returned an empty response`);
    }
    return reply;
  }
}

const parseReply = <T extends z.ZodTypeAny>(stage: string, reply: string, schema: T): z.output<T> => {
  let json: unknown;
  try {
    json = JSON.parse(extractJson(reply));
  } catch (error) {
    throw new GenerationError(`${stage} response is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new GenerationError(`${stage} response is incomplete: ${details}`);
  }
  return result.data;
};

/**
 * Local SEO pass. Appends a keyword recap paragraph when the keyword occurs
 * fewer than once per WORDS_PER_KEYWORD words, then the call-to-action block.
 * Both are skipped when already present, so applying it twice is a no-op.
 */
export const optimizePost = (
  post: GeneratedPost | null | undefined,
  task: KeywordTask,
  config: Configuration
): GeneratedPost => {
  if (!post) {
    throw new GenerationError(`Cannot optimize a missing post for "${task.keyword}"`);
  }

  let content = post.content.trimEnd();

  // Density is measured on the article body alone, so the paragraphs added
  // here never change the outcome of a later pass.
  const bodyWords = countWords(content.replace(INSERTED_PARAGRAPH, ' '));
  const required = Math.max(1, Math.floor(bodyWords / WORDS_PER_KEYWORD));
  const occurrences = countPhrase(content, task.keyword);
  const hasSummary = content.includes(`class="${KEYWORD_SUMMARY_CLASS}"`);
  if (occurrences === 0 || (occurrences < required && !hasSummary)) {
    const context = task.context ? `: ${escapeHtml(task.context)}` : '';
    const summary = `<p class="${KEYWORD_SUMMARY_CLASS}"><strong>${escapeHtml(task.keyword)}</strong>${context}</p>`;
    const ctaStart = content.indexOf(`<p class="${CTA_CLASS}"`);
    content = ctaStart === -1
      ? `${content}\n${summary}`
      : `${content.slice(0, ctaStart)}${summary}\n${content.slice(ctaStart)}`;
  }

  if (!content.includes(`class="${CTA_CLASS}"`)) {
    content += `\n${createCtaBlock(config.cta)}`;
  }

  return { ...post, content, wordCount: countWords(content) };
};

export const createCtaBlock = ({ url, text }: Configuration['cta']): string =>
  url
    ? `<p class="${CTA_CLASS}"><a href="${escapeHtml(url)}" target="_blank" rel="noopener">${escapeHtml(text)}</a></p>`
    : `<p class="${CTA_CLASS}">${escapeHtml(text)}</p>`;
