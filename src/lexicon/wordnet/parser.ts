/**
 * Line parsers for the WordNet database format (index.*, data.*, *.exc)
 */

import type { WordClass } from '../../types/lexicon.js';

/**
 * Single-letter part-of-speech codes used inside WordNet files.
 * `s` (adjective satellite) lives in the adjective files.
 */
export type PosCode = 'n' | 'v' | 'a' | 's' | 'r';

export const FILE_SUFFIX: Record<WordClass, string> = {
  noun: 'noun',
  verb: 'verb',
  adjective: 'adj',
  adverb: 'adv',
};

export function posCodeToWordClass(code: string): WordClass | undefined {
  switch (code) {
    case 'n':
      return 'noun';
    case 'v':
      return 'verb';
    case 'a':
    case 's':
      return 'adjective';
    case 'r':
      return 'adverb';
    default:
      return undefined;
  }
}

export interface IndexEntry {
  lemma: string;
  /** Byte offsets into the matching data file, most frequent sense first */
  offsets: string[];
}

export interface Pointer {
  symbol: string;
  offset: string;
  wordClass: WordClass;
  /** 1-based word number in this synset, 0 for a synset-level pointer */
  source: number;
  /** 1-based word number in the target synset, 0 for a synset-level pointer */
  target: number;
}

export interface DataRecord {
  offset: string;
  wordClass: WordClass;
  lemmas: string[];
  pointers: Pointer[];
  definition: string;
  examples: string[];
}

/**
 * License header lines start with a space
 */
export function isHeaderLine(line: string): boolean {
  return line.length === 0 || line.startsWith(' ');
}

export function parseIndexLine(line: string): IndexEntry | null {
  if (isHeaderLine(line)) return null;

  const fields = line.trim().split(/\s+/);
  const lemma = fields[0];
  const synsetCount = Number.parseInt(fields[2] ?? '', 10);
  if (!lemma || !Number.isFinite(synsetCount) || synsetCount <= 0) {
    return null;
  }

  return {
    lemma,
    offsets: fields.slice(fields.length - synsetCount),
  };
}

/**
 * `inflected base [base...]`
 */
export function parseExceptionLine(line: string): [string, string[]] | null {
  const fields = line.trim().split(/\s+/);
  const [inflected, ...bases] = fields;
  if (!inflected || bases.length === 0) return null;
  return [inflected, bases];
}

const SYNTACTIC_MARKER = /\([^)]*\)$/;

/**
 * Parse one data line:
 * `offset lex_filenum ss_type w_cnt word lex_id ... p_cnt ptr... [frames] | gloss`
 */
export function parseDataLine(line: string): DataRecord {
  const bar = line.indexOf(' | ');
  const head = bar >= 0 ? line.slice(0, bar) : line;
  const gloss = bar >= 0 ? line.slice(bar + 3).trim() : '';

  const fields = head.trim().split(/\s+/);
  let cursor = 0;
  const next = (): string => {
    const value = fields[cursor++];
    if (value === undefined) {
      throw new Error(`Truncated WordNet data line: ${line.slice(0, 40)}`);
    }
    return value;
  };

  const offset = next();
  next(); // lex_filenum
  const wordClass = posCodeToWordClass(next());
  if (!wordClass) {
    throw new Error(`Unknown synset type in WordNet data line ${offset}`);
  }

  const wordCount = Number.parseInt(next(), 16);
  const lemmas: string[] = [];
  for (let i = 0; i < wordCount; i++) {
    lemmas.push(next().replace(SYNTACTIC_MARKER, ''));
    next(); // lex_id
  }

  const pointerCount = Number.parseInt(next(), 10);
  const pointers: Pointer[] = [];
  for (let i = 0; i < pointerCount; i++) {
    const symbol = next();
    const target = next();
    const pointerClass = posCodeToWordClass(next());
    const sourceTarget = next();
    if (!pointerClass) continue;
    pointers.push({
      symbol,
      offset: target,
      wordClass: pointerClass,
      source: Number.parseInt(sourceTarget.slice(0, 2), 16),
      target: Number.parseInt(sourceTarget.slice(2, 4), 16),
    });
  }

  const examples = Array.from(gloss.matchAll(/"([^"]*)"/g), match => match[1] ?? '');
  const definition = gloss.replace(/"[^"]*"/g, '').trim().replace(/^[;\s]+|[;\s]+$/g, '');

  return { offset, wordClass, lemmas, pointers, definition, examples };
}
