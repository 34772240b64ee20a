import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'seo-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends tagged lines to the run log, creating its directory', () => {
    const logFile = join(dir, 'logs', 'run.log');
    const logger = createLogger({ tag: 'Runner', logFile, quiet: true });

    logger.info('started');
    logger.child('WordPress').warn('slow response');
    logger.error('publish failed', new Error('HTTP 500'));

    const lines = readFileSync(logFile, 'utf8').trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z INFO \[Runner\] started$/);
    expect(lines[1]).toMatch(/ WARN \[WordPress\] slow response$/);
    expect(lines[2]).toMatch(/ ERROR \[Runner\] publish failed: HTTP 500$/);
  });

  it('writes to the console unless quiet', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger({ tag: 'Runner' }).info('hello');
    createLogger({ tag: 'Runner' }).error('boom');
    createLogger({ tag: 'Runner', quiet: true }).info('hidden');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[Runner] hello');
    expect(error).toHaveBeenCalledWith('[Runner] boom');
  });
});
