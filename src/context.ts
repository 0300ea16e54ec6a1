/**
 * Process-wide services built once from configuration
 */

import type { Config } from './config/schema.js';
import { loadLexicon } from './lexicon/loader.js';
import { Paraphraser } from './paraphrase/paraphraser.js';
import { createSeededRandom, defaultRandom } from './paraphrase/random.js';
import { PosTextAnalyzer } from './text/pos-analyzer.js';
import type { LexicalSource } from './types/lexicon.js';
import type { TextAnalyzer } from './types/text.js';

export interface AppContext {
  config: Config;
  lexicon: LexicalSource;
  paraphraser: Paraphraser;
}

export interface AppContextOverrides {
  lexicon?: LexicalSource;
  analyzer?: TextAnalyzer;
}

export async function createAppContext(config: Config, overrides: AppContextOverrides = {}): Promise<AppContext> {
  const lexicon = overrides.lexicon ?? await loadLexicon(config.lexicon);
  const { seed, maxSynonyms } = config.paraphrase;

  const paraphraser = new Paraphraser({
    lexicon,
    analyzer: overrides.analyzer ?? new PosTextAnalyzer(),
    random: seed === undefined ? defaultRandom : createSeededRandom(seed),
    thresholds: config.thresholds,
    maxSynonyms,
  });

  return { config, lexicon, paraphraser };
}
