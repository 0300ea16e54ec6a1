/**
 * Irregular inflections from wink-lemmatizer, which bundles the WordNet
 * exception lists. Used for word classes whose dictionary ships no `*.exc`.
 */

import lemmatize from 'wink-lemmatizer';
import type { WordClass } from '../../types/lexicon.js';

/**
 * Base forms for an inflected form, or undefined when it is not listed
 */
export type IrregularForms = (form: string, wordClass: WordClass) => readonly string[] | undefined;

const LEMMATIZERS: Partial<Record<WordClass, (word: string) => string>> = {
  noun: word => lemmatize.noun(word),
  verb: word => lemmatize.verb(word),
  adjective: word => lemmatize.adjective(word),
};

export const bundledIrregularForms: IrregularForms = (form, wordClass) => {
  const lemmatizer = LEMMATIZERS[wordClass];
  if (!lemmatizer) return undefined;
  const base = lemmatizer(form);
  return base && base !== form ? [base] : undefined;
};
