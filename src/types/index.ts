export type AiProvider = 'openai' | 'openrouter' | 'anthropic' | 'gemini';

export type PostStatus = 'draft' | 'publish' | 'pending' | 'private';

export interface Configuration {
  ai: {
    provider: AiProvider;
    apiKey: string;
    model: string;
    timeoutMs: number;
  };
  wordpress: {
    siteUrl: string;
    username: string;
    appPassword: string;
    timeoutMs: number;
  };
  keywords: {
    file: string;
  };
  content: {
    postsPerRun: number;
    minWords: number;
    maxWords: number;
    targetCategory: string;
    postStatus: PostStatus;
    language: string;
    stopOnError: boolean;
    /** Adds a model revision pass between draft and optimize. */
    review: boolean;
    delaySeconds: number;
  };
  cta: {
    url: string;
    text: string;
  };
}

export interface KeywordTask {
  keyword: string;
  context?: string;
}

export interface ContentPlan {
  keyword: string;
  title: string;
  sections: string[];
  secondaryKeywords: string[];
  faqs: string[];
  metaDescription: string;
}

export interface GeneratedPost {
  title: string;
  content: string;
  keyword: string;
  wordCount: number;
  metaDescription: string;
}

export interface PublishResult {
  id: number;
  link: string;
  status: string;
  attempts: number;
}

export type PipelineStage = 'plan' | 'draft' | 'review' | 'optimize' | 'publish';

export type TaskOutcome =
  | { status: 'published'; task: KeywordTask; post: GeneratedPost; result: PublishResult }
  | { status: 'failed'; task: KeywordTask; stage: PipelineStage; error: string };

export type RunState = 'idle' | 'loading' | 'processing' | 'done' | 'aborted';

export interface RunReport {
  state: Extract<RunState, 'done' | 'aborted'>;
  outcomes: TaskOutcome[];
  error?: Error;
}

// WordPress REST API shapes (subset the pipeline reads)
export interface WPCreatePostInput {
  title: string;
  content: string;
  status: PostStatus;
  excerpt: string;
  categories?: number[];
}

export interface WPCategory {
  id: number;
  name: string;
}
