/**
 * WordNet morphology: reduce an inflected form to the base forms
 * present in the index (irregular forms first, then suffix rules).
 */

import type { WordClass } from '../../types/lexicon.js';

type Substitution = readonly [suffix: string, replacement: string];

const SUBSTITUTIONS: Record<WordClass, readonly Substitution[]> = {
  noun: [
    ['s', ''],
    ['ses', 's'],
    ['ves', 'f'],
    ['xes', 'x'],
    ['zes', 'z'],
    ['ches', 'ch'],
    ['shes', 'sh'],
    ['men', 'man'],
    ['ies', 'y'],
  ],
  verb: [
    ['s', ''],
    ['ies', 'y'],
    ['es', 'e'],
    ['es', ''],
    ['ed', 'e'],
    ['ed', ''],
    ['ing', 'e'],
    ['ing', ''],
  ],
  adjective: [
    ['er', ''],
    ['est', ''],
    ['er', 'e'],
    ['est', 'e'],
  ],
  adverb: [],
};

export interface MorphologyData {
  /** Listed base forms of an irregular inflection */
  irregularBases(form: string, wordClass: WordClass): readonly string[] | undefined;
  hasLemma(lemma: string, wordClass: WordClass): boolean;
}

function applyRules(forms: readonly string[], wordClass: WordClass): string[] {
  const result: string[] = [];
  for (const form of forms) {
    for (const [suffix, replacement] of SUBSTITUTIONS[wordClass]) {
      if (form.endsWith(suffix)) {
        result.push(form.slice(0, form.length - suffix.length) + replacement);
      }
    }
  }
  return result;
}

function keepKnown(forms: readonly string[], wordClass: WordClass, data: MorphologyData): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const form of forms) {
    if (!seen.has(form) && data.hasLemma(form, wordClass)) {
      seen.add(form);
      result.push(form);
    }
  }
  return result;
}

/**
 * Base forms of `form` known to the lexicon for `wordClass`, most direct first.
 * The form itself is included when it is already a lemma.
 */
export function morphy(form: string, wordClass: WordClass, data: MorphologyData): string[] {
  const irregular = data.irregularBases(form, wordClass);
  if (irregular) {
    const known = keepKnown([form, ...irregular], wordClass, data);
    if (known.length > 0) {
      return known;
    }
  }

  let forms = applyRules([form], wordClass);
  const direct = keepKnown([form, ...forms], wordClass, data);
  if (direct.length > 0) {
    return direct;
  }

  // each pass shortens every form (men -> man cannot match twice)
  while (forms.length > 0) {
    forms = applyRules(forms, wordClass).filter(f => f.length > 0);
    const known = keepKnown(forms, wordClass, data);
    if (known.length > 0) {
      return known;
    }
  }

  return [];
}
