import { createLanguageModelClient } from '../ai/languageModelClient.js';
import { loadConfig, withPostsPerRun } from '../config/configStore.js';
import { loadKeywords } from '../keywords/keywordSource.js';
import type {
  Configuration,
  GeneratedPost,
  KeywordTask,
  PipelineStage,
  RunReport,
  RunState,
  TaskOutcome,
} from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { sleep, type Sleep } from '../utils/networkUtils.js';
import { ContentGenerator } from './contentGenerator.js';
import { WordPressClient, type PostPublisher } from './wordpressClient.js';

/** Everything a task needs, built once per run and passed explicitly. */
export interface RunContext {
  config: Configuration;
  logger: Logger;
  generator: ContentGenerator;
  publisher: PostPublisher;
}

export interface RunOptions {
  configPath: string;
  /** Overrides `[Content] posts_per_run`. */
  posts?: number;
}

export interface OrchestratorDependencies {
  logger: Logger;
  loadConfig?: (path: string) => Configuration;
  loadKeywords?: (path: string) => KeywordTask[];
  createContext?: (config: Configuration, logger: Logger) => RunContext;
  sleep?: Sleep;
}

export const createRunContext = (config: Configuration, logger: Logger): RunContext => ({
  config,
  logger,
  generator: new ContentGenerator(createLanguageModelClient(config), logger.child('ContentGenerator')),
  publisher: new WordPressClient({ logger: logger.child('WordPress') }),
});

/**
 * Sequential plan → draft → (review) → optimize → publish run over the keyword file.
 *
 * idle → loading → processing → done, or → aborted when the configuration
 * or keyword file cannot be loaded. Task failures never abort unless
 * `[Content] stop_on_error` is set.
 */
export class Orchestrator {
  private currentState: RunState = 'idle';
  private readonly logger: Logger;
  private readonly deps: Required<Omit<OrchestratorDependencies, 'logger'>>;

  constructor(dependencies: OrchestratorDependencies) {
    this.logger = dependencies.logger;
    this.deps = {
      loadConfig: dependencies.loadConfig ?? loadConfig,
      loadKeywords: dependencies.loadKeywords ?? loadKeywords,
      createContext: dependencies.createContext ?? createRunContext,
      sleep: dependencies.sleep ?? sleep,
    };
  }

  get state(): RunState {
    return this.currentState;
  }

  async run(options: RunOptions): Promise<RunReport> {
    this.currentState = 'loading';

    let context: RunContext;
    let tasks: KeywordTask[];
    try {
      let config = this.deps.loadConfig(options.configPath);
      if (options.posts !== undefined) {
        config = withPostsPerRun(config, options.posts);
      }
      tasks = this.deps.loadKeywords(config.keywords.file);
      context = this.deps.createContext(config, this.logger);
    } catch (error) {
      this.currentState = 'aborted';
      this.logger.error('Run aborted during loading', error);
      return { state: 'aborted', outcomes: [], error: error instanceof Error ? error : new Error(String(error)) };
    }

    this.currentState = 'processing';
    const { postsPerRun, stopOnError, delaySeconds } = context.config.content;
    const selected = tasks.slice(0, Math.min(postsPerRun, tasks.length));
    this.logger.info(
      `Generating ${selected.length} post(s) from ${tasks.length} keyword(s): ${selected.map(task => task.keyword).join(', ')}`
    );

    const outcomes: TaskOutcome[] = [];
    for (const [index, task] of selected.entries()) {
      this.logger.info(`[${index + 1}/${selected.length}] Processing keyword: ${task.keyword}`);
      const outcome = await processTask(context, task);
      outcomes.push(outcome);

      if (outcome.status === 'failed' && stopOnError) {
        this.logger.warn('Stopping after the first failed task (stop_on_error is set)');
        break;
      }
      if (index < selected.length - 1 && delaySeconds > 0) {
        this.logger.info(`Waiting ${delaySeconds}s before the next post...`);
        await this.deps.sleep(delaySeconds * 1000);
      }
    }

    this.currentState = 'done';
    logSummary(this.logger, outcomes);
    return { state: 'done', outcomes };
  }
}

/**
 * Runs one task through every stage. Errors are turned into a failed outcome
 * naming the stage, so one bad keyword never takes the run down.
 */
export const processTask = async (context: RunContext, task: KeywordTask): Promise<TaskOutcome> => {
  const { config, logger, generator, publisher } = context;
  let stage: PipelineStage = 'plan';

  try {
    const plan = await generator.plan(task, config);
    logger.info(`Plan ready: "${plan.title}" (${plan.sections.length} sections)`);

    stage = 'draft';
    let draft = await generator.draft(plan, task, config);
    logger.info(`Draft ready: "${draft.title}" (${draft.wordCount} words)`);

    if (config.content.review) {
      stage = 'review';
      draft = await generator.review(draft, task, config);
    }

    stage = 'optimize';
    const post: GeneratedPost = generator.optimize(draft, task, config);

    stage = 'publish';
    const result = await publisher.publish(post, config);
    logger.info(`Published "${post.title}" for keyword "${task.keyword}" (ID ${result.id})`);

    return { status: 'published', task, post, result };
  } catch (error) {
    logger.error(`Keyword "${task.keyword}" failed at ${stage}`, error);
    return { status: 'failed', task, stage, error: errorMessage(error) };
  }
};

const logSummary = (logger: Logger, outcomes: TaskOutcome[]) => {
  const published = outcomes.filter(outcome => outcome.status === 'published').length;
  const failed = outcomes.length - published;
  logger.info(`Run complete: ${published} published, ${failed} failed`);

  for (const outcome of outcomes) {
    if (outcome.status === 'failed') {
      logger.warn(`  FAILED ${outcome.task.keyword} [${outcome.stage}]: ${outcome.error}`);
    } else {
      logger.info(`  OK     ${outcome.task.keyword} -> ${outcome.result.link || `post ${outcome.result.id}`}`);
    }
  }
};
