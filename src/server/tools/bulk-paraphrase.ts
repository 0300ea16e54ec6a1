/**
 * bulk_paraphrase tool implementation
 */

import { bulkParaphrase, type BulkResult } from '../../paraphrase/bulk.js';
import type { Paraphraser } from '../../paraphrase/paraphraser.js';
import { toWireBulkResult } from '../../paraphrase/serialize.js';
import type { LengthPreference, ParaphraseStyle } from '../../paraphrase/types.js';
import { compactDocument, formatCompactHeader, formatCompactTable } from './compact-format.js';
import { jsonResponse, textResponse, type ToolFormat, type ToolResponse } from './response.js';

export interface BulkParaphraseInput {
  paragraphs: string[];
  num_variations?: number;
  style?: ParaphraseStyle;
  length_preference?: LengthPreference;
  format?: ToolFormat;
}

export interface BulkToolLimits {
  maxParagraphs: number;
  numVariations: number;
}

function renderCompact(bulk: BulkResult): string {
  const rows = bulk.results.map(entry => ({
    index: entry.index,
    best_score: entry.result.bestScore,
    best_variation: entry.result.bestVariation,
  }));

  const sections = [
    formatCompactHeader('BULK', {
      success: bulk.success,
      errors: bulk.errors,
      variations: bulk.settings.numVariations,
      style: bulk.settings.style,
    }),
    formatCompactTable(['index', 'best_score', 'best_variation'], rows),
  ];

  if (bulk.errorsDetail.length > 0) {
    sections.push(formatCompactHeader('ERRORS'));
    sections.push(formatCompactTable(['index', 'error'], bulk.errorsDetail));
  }

  return compactDocument(sections);
}

function renderMarkdown(bulk: BulkResult): string {
  let output = `# Bulk Paraphrase (${bulk.success} done, ${bulk.errors} failed)\n\n`;

  for (const entry of bulk.results) {
    output += `## Paragraph ${entry.index + 1}\n\n`;
    output += `**Original**: ${entry.original}\n\n`;
    output += `**Best** (${entry.result.bestScore}): ${entry.result.bestVariation}\n\n`;
  }

  if (bulk.errorsDetail.length > 0) {
    output += '## Errors\n\n';
    for (const failure of bulk.errorsDetail) {
      output += `- Paragraph ${failure.index + 1}: ${failure.error}\n`;
    }
  }

  return output;
}

export async function bulkParaphraseTool(
  paraphraser: Pick<Paraphraser, 'paraphrase'>,
  input: BulkParaphraseInput,
  limits: BulkToolLimits
): Promise<ToolResponse> {
  const bulk = bulkParaphrase(paraphraser, input.paragraphs, {
    numVariations: input.num_variations ?? limits.numVariations,
    style: input.style,
    lengthPreference: input.length_preference,
    maxParagraphs: limits.maxParagraphs,
  });

  switch (input.format ?? 'compact') {
    case 'json':
      return jsonResponse(toWireBulkResult(bulk));
    case 'markdown':
      return textResponse(renderMarkdown(bulk));
    default:
      return textResponse(renderCompact(bulk));
  }
}
