/**
 * bulk command - Paraphrase every paragraph of a text file
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { createAppContext } from '../../context.js';
import { bulkParaphrase } from '../../paraphrase/bulk.js';
import { toWireBulkResult } from '../../paraphrase/serialize.js';
import { errorMessage, parseCount, parseLengthPreference, parseStyle, resolveConfig } from '../options.js';

interface BulkCommandOptions {
  number?: string;
  style?: string;
  length?: string;
  config?: string;
  json: boolean;
}

/**
 * Paragraphs are separated by one or more blank lines
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\r?\n\s*\r?\n/)
    .map(paragraph => paragraph.replace(/\s+/g, ' ').trim())
    .filter(paragraph => paragraph.length > 0);
}

export const bulkCommand = new Command('bulk')
  .description('Paraphrase each paragraph of a text file (paragraphs separated by blank lines)')
  .argument('<file>', 'Text file to read')
  .option('-n, --number <count>', 'Variations per paragraph')
  .option('-s, --style <style>', 'balanced, formal, casual, academic or simple')
  .option('-l, --length <preference>', 'same, shorter or longer')
  .option('-c, --config <path>', 'Path to a config file')
  .option('--json', 'Output as JSON', false)
  .action(async (file: string, options: BulkCommandOptions) => {
    try {
      const filePath = path.resolve(file);
      if (!fs.existsSync(filePath)) {
        throw new Error(`Input file not found: ${filePath}`);
      }

      const paragraphs = splitParagraphs(await fs.promises.readFile(filePath, 'utf-8'));
      const config = await resolveConfig(options.config);
      const context = await createAppContext(config);

      const bulk = bulkParaphrase(context.paraphraser, paragraphs, {
        numVariations: parseCount(options.number, 'Number of variations') ?? config.bulk.numVariations,
        style: parseStyle(options.style) ?? config.paraphrase.style,
        lengthPreference: parseLengthPreference(options.length) ?? config.paraphrase.lengthPreference,
        maxParagraphs: config.bulk.maxParagraphs,
      });

      if (options.json) {
        console.log(JSON.stringify(toWireBulkResult(bulk), null, 2));
        return;
      }

      console.log(`Paraphrased ${bulk.success} of ${paragraphs.length} paragraphs\n`);
      for (const entry of bulk.results) {
        console.log(`[${entry.index + 1}] ${entry.result.bestVariation}`);
      }
      for (const failure of bulk.errorsDetail) {
        console.log(`[${failure.index + 1}] skipped: ${failure.error}`);
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
