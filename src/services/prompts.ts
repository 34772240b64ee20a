import type { Configuration, ContentPlan, GeneratedPost, KeywordTask } from '../types/index.js';

export const SYSTEM_INSTRUCTION = `You are an expert SEO content strategist and writer. Your tone is professional, authoritative, and helpful. Always return a single, valid JSON object and nothing else.`;

export const createPlanPrompt = (task: KeywordTask, config: Configuration): string => `
Create a detailed plan for a blog article focused on the keyword "${task.keyword}".
${task.context ? `Angle / context for this article: ${task.context}\n` : ''}
The article must be optimized for search and written in ${config.content.language}.

Provide:
1. An engaging title that includes the main keyword
2. At least 5 section headings that structure the article
3. Related secondary keywords to weave in naturally
4. Frequently asked questions the article should answer
5. An SEO meta description (max 160 characters)

Return ONLY this JSON object:
{
  "title": "string",
  "sections": ["string"],
  "secondaryKeywords": ["string"],
  "faqs": ["string"],
  "metaDescription": "string"
}`.trim();

export interface DraftFeedback {
  wordCount: number;
}

export const createDraftPrompt = (
  plan: ContentPlan,
  task: KeywordTask,
  config: Configuration,
  feedback?: DraftFeedback
): string => {
  const { minWords, maxWords, language } = config.content;
  const sections = plan.sections.map(section => `- ${section}`).join('\n');

  const lengthCorrection = feedback
    ? `\nIMPORTANT: a previous version had ${feedback.wordCount} words, which is outside the required range. ` +
      `The body MUST be between ${minWords} and ${maxWords} words.\n`
    : '';

  return `
Write a complete, SEO-optimized blog article in ${language} based on this plan.

Title: ${plan.title}
Main keyword: ${task.keyword}
${task.context ? `Context: ${task.context}\n` : ''}
Section structure:
${sections}

Secondary keywords to include naturally: ${plan.secondaryKeywords.join(', ') || 'none'}
Questions to answer in a FAQ section: ${plan.faqs.join(' | ') || 'none'}

Guidelines:
1. Write between ${minWords} and ${maxWords} words
2. Open with an introduction that mentions the main keyword
3. Develop every section with specific, useful information
4. Use <h2> and <h3> headings, <p> paragraphs and lists where they help
5. End with a conclusion; do NOT add a call-to-action, one is appended later
${lengthCorrection}
Return ONLY this JSON object, with the article body as an HTML string (no <html>, <head> or <h1>):
{
  "title": "string",
  "content": "string"
}`.trim();
};

export const createReviewPrompt = (post: GeneratedPost, task: KeywordTask, config: Configuration): string => `
Review this blog article for SEO and editorial quality. It is written in ${config.content.language}.

Title: ${post.title}
Main keyword: ${task.keyword}
Meta description: ${post.metaDescription || 'none'}

Content:
${post.content}

Revise and fix:
1. Grammar and spelling mistakes
2. Keyword density: the main keyword should appear naturally, without stuffing
3. Heading structure: sections use <h2>, subsections <h3>
4. Readability: short paragraphs and clear transitions
5. The meta description: compelling, includes the keyword, max 160 characters
Keep the length between ${config.content.minWords} and ${config.content.maxWords} words and do NOT add a call-to-action.

Return ONLY this JSON object:
{
  "title": "string",
  "content": "string",
  "metaDescription": "string"
}`.trim();
