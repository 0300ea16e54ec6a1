/**
 * Tokenizer and Penn Treebank tagger backed by the `pos` library
 */

import pos from 'pos';
import type { TaggedToken, TextAnalyzer } from '../types/text.js';

const APOSTROPHES = new Set(["'", '’']);
const CLITIC_SUFFIXES = new Set(['s', 't', 're', 've', 'll', 'd', 'm']);
const WORD = /^[\p{L}\p{N}]+$/u;

/** Treebank tags for contraction and possessive tokens */
const CLITIC_TAGS: Readonly<Record<string, string>> = {
  "'s": 'POS',
  "n't": 'RB',
  "'re": 'VBP',
  "'ve": 'VBP',
  "'m": 'VBP',
  "'ll": 'MD',
  "'d": 'MD',
};

/**
 * Rejoin `word ' suffix` fragments into Treebank-style tokens:
 * `don ' t` becomes `do n't`, `company ' s` becomes `company 's`.
 */
export function mergeClitics(tokens: readonly string[]): string[] {
  const merged: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const word = tokens[i] ?? '';
    const apostrophe = tokens[i + 1] ?? '';
    const suffix = tokens[i + 2] ?? '';

    if (!WORD.test(word) || !APOSTROPHES.has(apostrophe) || !CLITIC_SUFFIXES.has(suffix.toLowerCase())) {
      merged.push(word);
      continue;
    }

    if (suffix.toLowerCase() === 't' && word.length > 1 && /n$/i.test(word)) {
      merged.push(word.slice(0, -1), `${word.slice(-1)}${apostrophe}${suffix}`);
    } else {
      merged.push(word, `${apostrophe}${suffix}`);
    }
    i += 2;
  }
  return merged;
}

function cliticTag(token: string): string | undefined {
  return CLITIC_TAGS[token.toLowerCase().replace('’', "'")];
}

export class PosTextAnalyzer implements TextAnalyzer {
  private readonly lexer = new pos.Lexer();
  private readonly tagger = new pos.Tagger();

  tokenize(text: string): string[] {
    return mergeClitics(this.lexer.lex(text));
  }

  tag(tokens: readonly string[]): string[] {
    const tagged = this.tagger.tag([...tokens]);
    if (tagged.length !== tokens.length) {
      throw new Error(`Tagger returned ${tagged.length} tags for ${tokens.length} tokens`);
    }
    return tagged.map(([, tag], i) => cliticTag(tokens[i] ?? '') ?? tag);
  }
}

/**
 * Tokenize and tag in one step
 */
export function analyze(analyzer: TextAnalyzer, text: string): TaggedToken[] {
  const tokens = analyzer.tokenize(text);
  const tags = analyzer.tag(tokens);
  return tokens.map((token, i) => ({ token, tag: tags[i] ?? '' }));
}
