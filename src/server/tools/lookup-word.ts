/**
 * lookup_word tool implementation
 */

import { lookupWord, type WordLookupResult } from '../../lexicon/lookup.js';
import type { LexicalSource } from '../../types/lexicon.js';
import { compactDocument, formatCompactHeader, formatCompactTable } from './compact-format.js';
import { jsonResponse, textResponse, type ToolFormat, type ToolResponse } from './response.js';

export interface LookupWordInput {
  word: string;
  format?: ToolFormat;
}

const SECTIONS = ['synonyms', 'antonyms', 'related', 'examples'] as const;

function renderCompact(result: WordLookupResult): string {
  const rows = SECTIONS.map(section => ({
    relation: section,
    count: result[section].length,
    values: result[section].join(section === 'examples' ? ' | ' : ', '),
  }));
  return compactDocument([
    formatCompactHeader('WORD', { word: result.word }),
    formatCompactTable(['relation', 'count', 'values'], rows),
  ]);
}

function renderMarkdown(result: WordLookupResult): string {
  let output = `# ${result.word}\n`;
  for (const section of SECTIONS) {
    const values = result[section];
    output += `\n## ${section.charAt(0).toUpperCase()}${section.slice(1)}\n\n`;
    output += values.length > 0 ? values.map(v => `- ${v}`).join('\n') : '_None_';
    output += '\n';
  }
  return output;
}

export async function lookupWordTool(
  lexicon: LexicalSource,
  input: LookupWordInput
): Promise<ToolResponse> {
  const result = lookupWord(lexicon, input.word);

  if (!result.word) {
    return textResponse('No word given. Pass a non-empty `word`.');
  }

  switch (input.format ?? 'compact') {
    case 'json':
      return jsonResponse(result);
    case 'markdown':
      return textResponse(renderMarkdown(result));
    default:
      return textResponse(renderCompact(result));
  }
}
