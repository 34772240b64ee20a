#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { DEFAULT_CONFIG_PATH } from './src/config/configStore.js';
import { Orchestrator } from './src/services/orchestrator.js';
import { createLogger } from './src/utils/logger.js';

const DEFAULT_LOG_FILE = 'logs/seo-post-pipeline.log';

const USAGE = `Usage: seo-post-pipeline [--config <path>] [--posts <N>] [--log-file <path>]

  -c, --config <path>    configuration file (default: ${DEFAULT_CONFIG_PATH})
  -p, --posts <N>        number of posts to generate, overrides [Content] posts_per_run
      --log-file <path>  run log (default: ${DEFAULT_LOG_FILE})
  -h, --help             show this help`;

const readArgs = () =>
  parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: DEFAULT_CONFIG_PATH },
      posts: { type: 'string', short: 'p' },
      'log-file': { type: 'string', default: DEFAULT_LOG_FILE },
      help: { type: 'boolean', short: 'h', default: false },
    },
  }).values;

async function main(): Promise<number> {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  let posts: number | undefined;
  if (values.posts !== undefined) {
    posts = /^\d+$/.test(values.posts) ? Number(values.posts) : NaN;
    if (!Number.isSafeInteger(posts) || posts < 1) {
      console.error(`--posts must be a positive whole number, got "${values.posts}"`);
      return 1;
    }
  }

  const logger = createLogger({ tag: 'Orchestrator', logFile: values['log-file'] });
  logger.info('Starting SEO post pipeline');

  const report = await new Orchestrator({ logger }).run({ configPath: values.config ?? DEFAULT_CONFIG_PATH, posts });
  return report.state === 'done' ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error) => {
    console.error('SEO post pipeline failed:', error);
    process.exitCode = 1;
  }
);
