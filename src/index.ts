/**
 * lexiphrase - word lookup and paraphrase generation
 *
 * This library provides a lexicon-backed paraphrase engine (candidate
 * generation, structural rewriting, divergence gating and quality scoring)
 * and exposes it through a CLI and the Model Context Protocol (MCP).
 */

// Types
export * from './types/index.js';

// Paraphrase engine
export * from './paraphrase/index.js';

// Lexicon
export {
  InMemoryLexicon,
  createInMemoryLexicon,
  WordNetLexicon,
  loadLexicon,
  resetLexiconCache,
  resolveWordNetPath,
  lookupWord,
  toWordClass,
  type LexiconOptions,
  type SynsetRecord,
  type LexiconFile,
  type WordLookupResult,
} from './lexicon/index.js';

// Synonyms
export { getSynonymsForWord, rankByStyle, formalityScore, type SynonymConfig } from './synonyms/index.js';

// Text
export { PosTextAnalyzer, analyze, normalizeSpacing, joinTokens } from './text/index.js';

// Application context
export { createAppContext, type AppContext, type AppContextOverrides } from './context.js';

// Server
export { createServer, startStdioServer, registerTools, type ServerOptions } from './server/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
