/**
 * WordNet 3.x dictionary as a LexicalSource.
 *
 * Index and exception files are parsed up front; data files are kept as
 * raw buffers and a synset line is decoded when its byte offset is asked for.
 * A word class without an exception file takes its irregular forms from
 * the bundled lists.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { LexicalSource, Synset, WordClass } from '../../types/lexicon.js';
import { normalizeLemma } from '../in-memory.js';
import { bundledIrregularForms, type IrregularForms } from './irregular.js';
import { morphy, type MorphologyData } from './morphy.js';
import {
  FILE_SUFFIX,
  isHeaderLine,
  parseDataLine,
  parseExceptionLine,
  parseIndexLine,
  type DataRecord,
} from './parser.js';

export const WORD_CLASSES: readonly WordClass[] = ['noun', 'verb', 'adjective', 'adverb'];

const HYPERNYM = '@';
const HYPONYM = '~';
const ANTONYM = '!';

/**
 * Raw dictionary contents for each word class
 */
export interface WordNetFiles {
  index: Record<WordClass, string>;
  data: Record<WordClass, Buffer>;
  exceptions: Partial<Record<WordClass, string>>;
}

function parseIndex(content: string): Map<string, string[]> {
  const entries = new Map<string, string[]>();
  for (const line of content.split('\n')) {
    const entry = parseIndexLine(line);
    if (entry) {
      entries.set(entry.lemma, entry.offsets);
    }
  }
  return entries;
}

function parseExceptions(content: string | undefined): Map<string, string[]> | undefined {
  if (content === undefined) return undefined;
  const entries = new Map<string, string[]>();
  for (const line of content.split('\n')) {
    if (isHeaderLine(line)) continue;
    const parsed = parseExceptionLine(line);
    if (parsed) {
      entries.set(parsed[0], parsed[1]);
    }
  }
  return entries;
}

export class WordNetLexicon implements LexicalSource, MorphologyData {
  private readonly index: Record<WordClass, Map<string, string[]>>;
  private readonly exceptionLists: Record<WordClass, Map<string, string[]> | undefined>;
  private readonly data: Record<WordClass, Buffer>;

  constructor(files: WordNetFiles, private readonly fallbackIrregulars: IrregularForms = bundledIrregularForms) {
    this.index = {
      noun: parseIndex(files.index.noun),
      verb: parseIndex(files.index.verb),
      adjective: parseIndex(files.index.adjective),
      adverb: parseIndex(files.index.adverb),
    };
    this.exceptionLists = {
      noun: parseExceptions(files.exceptions.noun),
      verb: parseExceptions(files.exceptions.verb),
      adjective: parseExceptions(files.exceptions.adjective),
      adverb: parseExceptions(files.exceptions.adverb),
    };
    this.data = files.data;
  }

  /**
   * Read a dictionary directory (index.*, data.*, optional *.exc)
   */
  static async load(dictPath: string): Promise<WordNetLexicon> {
    const root = path.resolve(dictPath);
    if (!fs.existsSync(root)) {
      throw new Error(`WordNet dictionary not found: ${root}`);
    }

    const readText = async (name: string): Promise<string> => {
      const filePath = path.join(root, name);
      if (!fs.existsSync(filePath)) {
        throw new Error(`WordNet file not found: ${filePath}`);
      }
      return fs.promises.readFile(filePath, 'utf-8');
    };

    const readOptional = async (name: string): Promise<string | undefined> => {
      const filePath = path.join(root, name);
      return fs.existsSync(filePath) ? fs.promises.readFile(filePath, 'utf-8') : undefined;
    };

    const readData = async (name: string): Promise<Buffer> => {
      const filePath = path.join(root, name);
      if (!fs.existsSync(filePath)) {
        throw new Error(`WordNet file not found: ${filePath}`);
      }
      return fs.promises.readFile(filePath);
    };

    const [indexNoun, indexVerb, indexAdj, indexAdv] = await Promise.all(
      WORD_CLASSES.map(wc => readText(`index.${FILE_SUFFIX[wc]}`))
    );
    const [dataNoun, dataVerb, dataAdj, dataAdv] = await Promise.all(
      WORD_CLASSES.map(wc => readData(`data.${FILE_SUFFIX[wc]}`))
    );
    const [excNoun, excVerb, excAdj, excAdv] = await Promise.all(
      WORD_CLASSES.map(wc => readOptional(`${FILE_SUFFIX[wc]}.exc`))
    );

    if (!indexNoun || !indexVerb || !indexAdj || !indexAdv || !dataNoun || !dataVerb || !dataAdj || !dataAdv) {
      throw new Error(`Incomplete WordNet dictionary: ${root}`);
    }

    const exceptions = { noun: excNoun, verb: excVerb, adjective: excAdj, adverb: excAdv };
    const missing = WORD_CLASSES.filter(wc => exceptions[wc] === undefined).map(wc => `${FILE_SUFFIX[wc]}.exc`);
    if (missing.length > 0) {
      console.error(`WordNet exception lists missing in ${root} (${missing.join(', ')}); using bundled irregular forms`);
    }

    return new WordNetLexicon({
      index: { noun: indexNoun, verb: indexVerb, adjective: indexAdj, adverb: indexAdv },
      data: { noun: dataNoun, verb: dataVerb, adjective: dataAdj, adverb: dataAdv },
      exceptions,
    });
  }

  irregularBases(form: string, wordClass: WordClass): readonly string[] | undefined {
    const listed = this.exceptionLists[wordClass];
    return listed ? listed.get(form) : this.fallbackIrregulars(form, wordClass);
  }

  hasLemma(lemma: string, wordClass: WordClass): boolean {
    return this.index[wordClass].has(lemma);
  }

  synsetsFor(word: string, wordClass?: WordClass): Synset[] {
    const lemma = normalizeLemma(word);
    if (!lemma) return [];

    const classes = wordClass ? [wordClass] : WORD_CLASSES;
    const seen = new Set<string>();
    const senses: Synset[] = [];

    for (const wc of classes) {
      for (const form of morphy(lemma, wc, this)) {
        for (const offset of this.index[wc].get(form) ?? []) {
          const synset = this.synsetAt(wc, offset);
          if (!seen.has(synset.id)) {
            seen.add(synset.id);
            senses.push(synset);
          }
        }
      }
    }

    return senses;
  }

  /**
   * Decode the synset stored at `offset` in the word class's data file
   */
  synsetAt(wordClass: WordClass, offset: string): Synset {
    const record = this.readRecord(wordClass, offset);
    const related = (symbol: string) => (): Synset[] =>
      record.pointers
        .filter(p => p.symbol === symbol)
        .map(p => this.synsetAt(p.wordClass, p.offset));

    return {
      id: `${FILE_SUFFIX[wordClass]}:${record.offset}`,
      wordClass: record.wordClass,
      lemmas: record.lemmas,
      definition: record.definition,
      examples: record.examples,
      antonyms: this.antonymsOf(record),
      hypernyms: related(HYPERNYM),
      hyponyms: related(HYPONYM),
    };
  }

  private antonymsOf(record: DataRecord): string[] {
    const antonyms: string[] = [];
    for (const pointer of record.pointers) {
      if (pointer.symbol !== ANTONYM) continue;
      const target = this.readRecord(pointer.wordClass, pointer.offset);
      if (pointer.target > 0) {
        const lemma = target.lemmas[pointer.target - 1];
        if (lemma) antonyms.push(lemma);
      } else {
        antonyms.push(...target.lemmas);
      }
    }
    return antonyms;
  }

  private readRecord(wordClass: WordClass, offset: string): DataRecord {
    const buffer = this.data[wordClass];
    const start = Number.parseInt(offset, 10);
    if (!Number.isFinite(start) || start < 0 || start >= buffer.length) {
      throw new Error(`WordNet offset out of range: ${FILE_SUFFIX[wordClass]}:${offset}`);
    }

    const newline = buffer.indexOf(0x0a, start);
    const line = buffer.toString('utf8', start, newline === -1 ? buffer.length : newline);
    if (!line.startsWith(offset)) {
      throw new Error(`Corrupt WordNet data at ${FILE_SUFFIX[wordClass]}:${offset}`);
    }

    return parseDataLine(line);
  }
}
