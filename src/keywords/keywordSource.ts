import { readFileSync } from 'node:fs';
import type { KeywordTask } from '../types/index.js';
import { KeywordFileError, errorMessage } from '../utils/errors.js';

const COMMENT_MARKER = '#';
const CONTEXT_DELIMITER = ':';

/**
 * Parses keyword-file text, one `keyword: optional context` entry per line.
 * Blank lines and `#` comments are skipped; only the first `:` splits.
 */
export const parseKeywords = (text: string): KeywordTask[] => {
  const tasks: KeywordTask[] = [];

  for (const rawLine of text.replace(/^\uFEFF/, '').split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith(COMMENT_MARKER)) continue;

    const delimiterIndex = line.indexOf(CONTEXT_DELIMITER);
    const keyword = (delimiterIndex === -1 ? line : line.slice(0, delimiterIndex)).trim();
    const context = delimiterIndex === -1 ? '' : line.slice(delimiterIndex + 1).trim();
    if (!keyword) continue;

    tasks.push(context ? { keyword, context } : { keyword });
  }

  return tasks;
};

/**
 * Reads the keyword file. Every call re-reads it, so the same file always
 * yields the same ordered list.
 * @throws {KeywordFileError} when the file is unreadable or has no entries.
 */
export const loadKeywords = (path: string): KeywordTask[] => {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new KeywordFileError(`Keyword file could not be read: ${path} (${errorMessage(error)})`, { cause: error });
  }

  const tasks = parseKeywords(text);
  if (tasks.length === 0) {
    throw new KeywordFileError(`Keyword file ${path} has no keywords. Add at least one non-comment line.`);
  }
  return tasks;
};
