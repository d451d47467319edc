import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { getPackageRoot } from '../shared/utils.js';
import { ConfigError } from '../shared/errors.js';

export interface WordCount {
  word: string;
  count: number;
}

const MIN_TOKEN_LENGTH = 3;

export function defaultStopwordsPath(): string {
  return path.join(getPackageRoot(), 'data', 'stopwords.json');
}

export function loadStopwords(extra: readonly string[] = [], filePath = defaultStopwordsPath()): Set<string> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read stopwords from ${filePath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = z.array(z.string()).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Stopwords file must be a JSON array of strings: ${filePath}`);
  }
  return new Set([...parsed.data, ...extra].map((w) => w.toLowerCase()));
}

/**
 * Lowercase, turn apostrophes into spaces, keep only [a-z0-9 -.], drop 1-4 digit numbers.
 */
export function cleanTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[‘’´`']/g, ' ')
    .replace(/[^a-z0-9\s\-.]/g, ' ')
    .replace(/\b\d{1,4}\b/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(title: string, stopwords: ReadonlySet<string>): string[] {
  const tokens: string[] = [];
  for (const raw of cleanTitle(title).split(' ')) {
    const token = raw.replace(/^[-.]+|[-.]+$/g, '');
    if (token.length < MIN_TOKEN_LENGTH || stopwords.has(token)) continue;
    tokens.push(token);
  }
  return tokens;
}

/**
 * Token counts over all titles, most frequent first; equal counts ordered by token.
 */
export function wordFrequencies(titles: Iterable<string>, stopwords: ReadonlySet<string>): WordCount[] {
  const counts = new Map<string, number>();
  for (const title of titles) {
    for (const token of tokenize(title, stopwords)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));
}
