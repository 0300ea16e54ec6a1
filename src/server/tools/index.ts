/**
 * MCP Tool registration
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AppContext } from '../../context.js';
import { PARAPHRASE_STYLES, LENGTH_PREFERENCES } from '../../paraphrase/types.js';
import { bulkParaphraseTool } from './bulk-paraphrase.js';
import { lookupWordTool } from './lookup-word.js';
import { paraphraseSentenceTool } from './paraphrase-sentence.js';
import { errorResponse, type ToolResponse } from './response.js';

const responseFormatSchema = z.enum(['compact', 'json', 'markdown']).optional().default('compact')
  .describe('Response format');

const styleSchema = z.enum(['balanced', 'formal', 'casual', 'academic', 'simple']).optional()
  .describe(`Synonym preference: ${PARAPHRASE_STYLES.join(', ')}`);

const lengthSchema = z.enum(['same', 'shorter', 'longer']).optional()
  .describe(`Preferred variant length: ${LENGTH_PREFERENCES.join(', ')}`);

/**
 * Turn a thrown error into an `isError` tool result
 */
export function withErrorResponse<TInput>(
  handler: (input: TInput) => Promise<ToolResponse>
): (input: TInput) => Promise<ToolResponse> {
  return async (input: TInput): Promise<ToolResponse> => {
    try {
      return await handler(input);
    } catch (error) {
      return errorResponse(error);
    }
  };
}

export function registerTools(server: McpServer, context: AppContext): void {
  const { config, lexicon, paraphraser } = context;

  server.tool(
    'lookup_word',
    'Look up synonyms, antonyms, related words and usage examples for a single word.',
    {
      word: z.string().min(1).describe('Word to look up'),
      format: responseFormatSchema,
    },
    { title: 'Look Up Word' },
    withErrorResponse(async ({ word, format }) => {
      return lookupWordTool(lexicon, { word, format });
    })
  );

  server.tool(
    'paraphrase_sentence',
    'Generate ranked paraphrases of a sentence by synonym substitution. anti_detection maximizes word and phrase divergence.',
    {
      sentence: z.string().min(1).describe('Sentence to paraphrase'),
      num_variations: z.number().int().min(1).max(20).optional().describe('Number of variations to return'),
      style: styleSchema,
      length_preference: lengthSchema,
      anti_detection: z.boolean().optional().describe('Aggressive rewrite with minimum divergence thresholds'),
      format: responseFormatSchema,
    },
    { title: 'Paraphrase Sentence' },
    withErrorResponse(async ({ sentence, num_variations, style, length_preference, anti_detection, format }) => {
      return paraphraseSentenceTool(paraphraser, {
        sentence,
        num_variations: num_variations ?? config.paraphrase.numVariations,
        style: style ?? config.paraphrase.style,
        length_preference: length_preference ?? config.paraphrase.lengthPreference,
        anti_detection: anti_detection ?? config.paraphrase.antiDetection,
        format,
      });
    })
  );

  server.tool(
    'bulk_paraphrase',
    'Paraphrase several paragraphs with shared settings. Empty paragraphs are reported as errors.',
    {
      paragraphs: z.array(z.string()).min(1).max(config.bulk.maxParagraphs).describe('Paragraphs to paraphrase'),
      num_variations: z.number().int().min(1).max(20).optional().describe('Variations per paragraph'),
      style: styleSchema,
      length_preference: lengthSchema,
      format: responseFormatSchema,
    },
    { title: 'Bulk Paraphrase' },
    withErrorResponse(async ({ paragraphs, num_variations, style, length_preference, format }) => {
      return bulkParaphraseTool(paraphraser, {
        paragraphs,
        num_variations,
        style: style ?? config.paraphrase.style,
        length_preference: length_preference ?? config.paraphrase.lengthPreference,
        format,
      }, config.bulk);
    })
  );
}
