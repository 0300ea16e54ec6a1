/**
 * Test fixture helpers
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { createInMemoryLexicon, type InMemoryLexicon } from '../../src/lexicon/in-memory.js';
import { isAlphanumeric } from '../../src/paraphrase/eligibility.js';
import type { RandomSource } from '../../src/paraphrase/random.js';
import type { TextAnalyzer } from '../../src/types/text.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = path.join(__dirname, '..', 'fixtures');

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...segments: string[]): string {
  return path.join(FIXTURES_DIR, ...segments);
}

/**
 * Read a fixture file's content
 */
export function readFixture(...segments: string[]): string {
  return fs.readFileSync(getFixturePath(...segments), 'utf-8');
}

/**
 * Directory holding the miniature WordNet dictionary
 */
export const WORDNET_FIXTURE_DIR = getFixturePath('wordnet');

/**
 * In-memory lexicon built from tests/fixtures/lexicon/<name>.json
 */
export function loadFixtureLexicon(name = 'basic'): InMemoryLexicon {
  const raw: unknown = JSON.parse(readFixture('lexicon', `${name}.json`));
  return createInMemoryLexicon(raw);
}

/**
 * Random source replaying `values` in a loop
 */
export function sequenceRandom(values: readonly number[]): RandomSource {
  let position = 0;
  return () => {
    const value = values[position % values.length] ?? 0;
    position++;
    return value;
  };
}

/**
 * Tags used by the stub analyzer when a test gives none
 */
export const DEFAULT_TAGS: Readonly<Record<string, string>> = {
  the: 'DT',
  a: 'DT',
  an: 'DT',
  this: 'DT',
  on: 'IN',
  near: 'IN',
  at: 'IN',
  sat: 'VBD',
  is: 'VBZ',
  it: 'PRP',
  he: 'PRP',
  red: 'JJ',
  quickly: 'RB',
};

/**
 * Deterministic analyzer: words (with an optional 's suffix) and single
 * punctuation marks; words without a known tag are nouns.
 */
export function createStubAnalyzer(tags: Readonly<Record<string, string>> = DEFAULT_TAGS): TextAnalyzer {
  return {
    tokenize: text => text.match(/[A-Za-z0-9]+(?:'[A-Za-z]+)?|[^\sA-Za-z0-9]/g) ?? [],
    tag: tokens => tokens.map(token => tags[token.toLowerCase()] ?? (isAlphanumeric(token) ? 'NN' : token)),
  };
}

/**
 * Create a temporary directory with files for testing
 */
export function createTempProject(files: Record<string, string>): {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  removeFile: (relativePath: string) => void;
  getFilePath: (relativePath: string) => string;
} {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexiphrase-'));

  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }

  const cleanup = (): void => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  const removeFile = (relativePath: string): void => {
    const filePath = path.join(rootDir, relativePath);
    if (fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
    }
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, removeFile, getFilePath };
}

/**
 * Sample config file contents
 */
export const VALID_CONFIG = {
  lexicon: {
    source: 'json',
    path: 'lexicon.json',
  },
  paraphrase: {
    numVariations: 3,
    style: 'formal',
    seed: 7,
  },
  thresholds: {
    fallbackWordChange: 0.6,
  },
};

export const MINIMAL_CONFIG = {};

export const INVALID_SCHEMA_CONFIG = {
  paraphrase: {
    numVariations: 0,
    style: 'poetic',
  },
};
