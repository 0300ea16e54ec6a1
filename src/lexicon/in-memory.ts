/**
 * Lexicon backed by plain synset records (tests, custom vocabularies, JSON files)
 */

import { z } from 'zod';
import type { LexicalSource, Synset, WordClass } from '../types/lexicon.js';

export const wordClassSchema = z.enum(['noun', 'verb', 'adjective', 'adverb']);

export const synsetRecordSchema = z.object({
  id: z.string().min(1),
  wordClass: wordClassSchema,
  lemmas: z.array(z.string().min(1)).min(1),
  definition: z.string().default(''),
  examples: z.array(z.string()).default([]),
  antonyms: z.array(z.string()).default([]),
  hypernyms: z.array(z.string()).default([]),
  hyponyms: z.array(z.string()).default([]),
});

export const lexiconFileSchema = z.object({
  synsets: z.array(synsetRecordSchema),
});

export type SynsetRecord = z.input<typeof synsetRecordSchema>;
export type LexiconFile = z.input<typeof lexiconFileSchema>;

export function normalizeLemma(word: string): string {
  return word.trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Exact-match lexicon: a word's senses are the records listing it as a
 * lemma, in record order. Relations naming unknown ids are dropped.
 */
export class InMemoryLexicon implements LexicalSource {
  private readonly synsets = new Map<string, Synset>();
  private readonly byLemma = new Map<string, Synset[]>();

  constructor(records: readonly SynsetRecord[]) {
    const parsed = records.map(record => synsetRecordSchema.parse(record));

    for (const record of parsed) {
      if (this.synsets.has(record.id)) {
        throw new Error(`Duplicate synset id: ${record.id}`);
      }

      const resolve = (ids: string[]) => (): Synset[] =>
        ids.flatMap(id => {
          const target = this.synsets.get(id);
          return target ? [target] : [];
        });

      const synset: Synset = {
        id: record.id,
        wordClass: record.wordClass,
        lemmas: Object.freeze([...record.lemmas]),
        definition: record.definition,
        examples: Object.freeze([...record.examples]),
        antonyms: Object.freeze([...record.antonyms]),
        hypernyms: resolve(record.hypernyms),
        hyponyms: resolve(record.hyponyms),
      };
      this.synsets.set(record.id, synset);

      for (const lemma of new Set(record.lemmas.map(normalizeLemma))) {
        const senses = this.byLemma.get(lemma) ?? [];
        senses.push(synset);
        this.byLemma.set(lemma, senses);
      }
    }
  }

  synsetsFor(word: string, wordClass?: WordClass): Synset[] {
    const senses = this.byLemma.get(normalizeLemma(word)) ?? [];
    return wordClass ? senses.filter(s => s.wordClass === wordClass) : [...senses];
  }

  get size(): number {
    return this.synsets.size;
  }
}

/**
 * Build a lexicon from the parsed contents of a JSON lexicon file
 */
export function createInMemoryLexicon(data: unknown): InMemoryLexicon {
  const result = lexiconFileSchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid lexicon:\n${errors}`);
  }
  return new InMemoryLexicon(result.data.synsets);
}
