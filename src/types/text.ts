/**
 * Tokenizer / part-of-speech tagger types
 */

export interface TaggedToken {
  token: string;
  /** Penn Treebank tag, e.g. NN, VBD, JJ */
  tag: string;
}

/**
 * Splits text into word/punctuation tokens and labels each token.
 * `tag` returns one label per token, in the same order.
 */
export interface TextAnalyzer {
  tokenize(text: string): string[];
  tag(tokens: readonly string[]): string[];
}
