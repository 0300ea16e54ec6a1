export { PosTextAnalyzer, analyze } from './pos-analyzer.js';
export { normalizeSpacing, joinTokens } from './punctuation.js';
