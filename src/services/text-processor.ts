/**
 * Text Processor
 *
 * Tokenization and stop-word lookup used by the lexical sentiment scorer.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface TextProcessor {
  tokenize(text: string): string[];
  isStopWord(token: string): boolean;
}

/**
 * Word runs (letters and digits, joined by inner hyphens or apostrophes) and
 * single punctuation characters
 */
const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*|[^\s\p{L}\p{N}]/gu;

export const DEFAULT_STOP_WORDS_PATH = path.join(__dirname, '../../data/stop-words.json');

/**
 * Read a stop-word list stored as a JSON array of strings
 */
export function loadStopWords(filePath: string = DEFAULT_STOP_WORDS_PATH): string[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!Array.isArray(parsed) || !parsed.every((word): word is string => typeof word === 'string')) {
    throw new Error(`Stop-word list at ${filePath} must be a JSON array of strings`);
  }
  return parsed;
}

export class SimpleTextProcessor implements TextProcessor {
  private readonly stopWords: Set<string>;

  constructor(stopWords: Iterable<string> = loadStopWords()) {
    this.stopWords = new Set(Array.from(stopWords, (word) => word.toLowerCase()));
  }

  tokenize(text: string): string[] {
    return text.match(TOKEN_PATTERN) ?? [];
  }

  isStopWord(token: string): boolean {
    return this.stopWords.has(token.toLowerCase());
  }
}
