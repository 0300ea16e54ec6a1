/**
 * One-time lexicon bootstrap.
 *
 * Loading is memoized per (source, path) for the life of the process, so
 * every caller shares the same read-only lexicon and repeated calls are free.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { LexicalSource } from '../types/lexicon.js';
import { createInMemoryLexicon } from './in-memory.js';
import { WordNetLexicon } from './wordnet/lexicon.js';

export type LexiconSourceKind = 'wordnet' | 'json';

export interface LexiconOptions {
  source: LexiconSourceKind;
  /** WordNet dict directory or JSON lexicon file */
  path?: string;
}

const loaded = new Map<string, Promise<LexicalSource>>();

/**
 * Directory of the WordNet database shipped by the `wordnet-db` package
 */
export async function resolveWordNetPath(): Promise<string> {
  const override = process.env['LEXIPHRASE_WORDNET'];
  if (override) {
    return path.resolve(override);
  }

  try {
    const { default: wordnet } = await import('wordnet-db');
    return wordnet.path;
  } catch (error) {
    throw new Error(
      'No WordNet dictionary available: install the optional "wordnet-db" package, ' +
      'set LEXIPHRASE_WORDNET, or configure lexicon.path ' +
      `(${error instanceof Error ? error.message : String(error)})`
    );
  }
}

async function readJsonLexicon(filePath: string): Promise<LexicalSource> {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Lexicon file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in lexicon file: ${absolutePath}`);
  }

  return createInMemoryLexicon(raw);
}

async function openLexicon(options: LexiconOptions): Promise<LexicalSource> {
  if (options.source === 'json') {
    if (!options.path) {
      throw new Error('lexicon.path is required when lexicon.source is "json"');
    }
    return readJsonLexicon(options.path);
  }

  const dictPath = options.path ?? await resolveWordNetPath();
  return WordNetLexicon.load(dictPath);
}

/**
 * Load (or reuse) the lexicon described by `options`.
 * A failed load is forgotten so a later call can retry.
 */
export function loadLexicon(options: LexiconOptions = { source: 'wordnet' }): Promise<LexicalSource> {
  const key = `${options.source}:${options.path ? path.resolve(options.path) : ''}`;
  const cached = loaded.get(key);
  if (cached) {
    return cached;
  }

  const pending = openLexicon(options);
  loaded.set(key, pending);
  pending.catch(() => loaded.delete(key));
  return pending;
}

/**
 * Forget loaded lexicons (tests)
 */
export function resetLexiconCache(): void {
  loaded.clear();
}
