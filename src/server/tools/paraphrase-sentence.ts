/**
 * paraphrase_sentence tool implementation
 */

import type { Paraphraser } from '../../paraphrase/paraphraser.js';
import { toWireResult } from '../../paraphrase/serialize.js';
import type { LengthPreference, ParaphraseResult, ParaphraseStyle } from '../../paraphrase/types.js';
import { compactDocument, formatCompactHeader, formatCompactTable } from './compact-format.js';
import { jsonResponse, textResponse, type ToolFormat, type ToolResponse } from './response.js';

export interface ParaphraseSentenceInput {
  sentence: string;
  num_variations?: number;
  style?: ParaphraseStyle;
  length_preference?: LengthPreference;
  anti_detection?: boolean;
  format?: ToolFormat;
}

export function renderParaphraseCompact(result: ParaphraseResult): string {
  const rows = result.variations.map((text, i) => {
    const stats = result.variationStats[i];
    return {
      rank: i + 1,
      score: stats?.score,
      similarity: stats?.similarityPercent,
      changes: stats?.wordChanges,
      text,
    };
  });

  const sections = [
    formatCompactHeader('PARAPHRASE', {
      best_score: result.bestScore,
      variations: result.variations.length,
      style: result.style,
      length: result.lengthPreference,
      anti_detection: result.antiDetection ? 'Y' : 'N',
    }),
    formatCompactTable(['rank', 'score', 'similarity', 'changes', 'text'], rows),
  ];

  if (result.antiDetectionVariant) {
    sections.push(`${formatCompactHeader('ANTI_DETECTION')} ${result.antiDetectionVariant}`);
  }

  return compactDocument(sections);
}

export function renderParaphraseMarkdown(result: ParaphraseResult): string {
  let output = `# Paraphrases\n\n**Original**: ${result.original}\n\n`;
  output += '| # | Score | Similarity | Changes | Variation |\n';
  output += '|---|-------|------------|---------|-----------|\n';

  result.variations.forEach((text, i) => {
    const stats = result.variationStats[i];
    output += `| ${i + 1} | ${stats?.score ?? ''} | ${stats?.similarityPercent ?? ''}% | ${stats?.wordChanges ?? ''} | ${text} |\n`;
  });

  output += `\n**Best** (${result.bestScore}): ${result.bestVariation}\n`;
  if (result.antiDetectionVariant) {
    output += `\n**High-divergence rewrite**: ${result.antiDetectionVariant}\n`;
  }
  return output;
}

export async function paraphraseSentenceTool(
  paraphraser: Pick<Paraphraser, 'paraphrase'>,
  input: ParaphraseSentenceInput
): Promise<ToolResponse> {
  const result = paraphraser.paraphrase(input.sentence, {
    numVariations: input.num_variations,
    style: input.style,
    lengthPreference: input.length_preference,
    antiDetection: input.anti_detection,
  });

  switch (input.format ?? 'compact') {
    case 'json':
      return jsonResponse(toWireResult(result));
    case 'markdown':
      return textResponse(renderParaphraseMarkdown(result));
    default:
      return textResponse(renderParaphraseCompact(result));
  }
}
