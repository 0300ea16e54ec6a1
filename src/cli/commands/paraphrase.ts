/**
 * paraphrase command - Paraphrase one sentence
 */

import { Command } from 'commander';
import { createAppContext } from '../../context.js';
import { toWireResult } from '../../paraphrase/serialize.js';
import type { ParaphraseResult } from '../../paraphrase/types.js';
import {
  errorMessage,
  parseCount,
  parseLengthPreference,
  parseSeed,
  parseStyle,
  resolveConfig,
} from '../options.js';

interface ParaphraseCommandOptions {
  number?: string;
  style?: string;
  length?: string;
  antiDetection: boolean;
  seed?: string;
  config?: string;
  json: boolean;
}

function printResult(result: ParaphraseResult): void {
  console.log(`Original: ${result.original}`);
  console.log(`Best (${result.bestScore}): ${result.bestVariation}\n`);

  result.variations.forEach((text, i) => {
    const stats = result.variationStats[i];
    const details = stats
      ? ` (similarity ${stats.similarityPercent}%, ${stats.wordChanges} changed)`
      : '';
    console.log(`${i + 1}. [${stats?.score ?? 0}] ${text}${details}`);
  });

  if (result.antiDetectionVariant) {
    console.log(`\nHigh-divergence rewrite: ${result.antiDetectionVariant}`);
  }
}

export const paraphraseCommand = new Command('paraphrase')
  .description('Generate ranked paraphrases of a sentence')
  .argument('<sentence>', 'Sentence to paraphrase')
  .option('-n, --number <count>', 'Number of variations')
  .option('-s, --style <style>', 'balanced, formal, casual, academic or simple')
  .option('-l, --length <preference>', 'same, shorter or longer')
  .option('--anti-detection', 'Aggressive rewrite with minimum divergence', false)
  .option('--seed <seed>', 'Seed the random source for reproducible output')
  .option('-c, --config <path>', 'Path to a config file')
  .option('--json', 'Output as JSON', false)
  .action(async (sentence: string, options: ParaphraseCommandOptions) => {
    try {
      const config = await resolveConfig(options.config);
      const seed = parseSeed(options.seed);
      const context = await createAppContext({
        ...config,
        paraphrase: { ...config.paraphrase, seed: seed ?? config.paraphrase.seed },
      });

      const result = context.paraphraser.paraphrase(sentence, {
        numVariations: parseCount(options.number, 'Number of variations') ?? config.paraphrase.numVariations,
        style: parseStyle(options.style) ?? config.paraphrase.style,
        lengthPreference: parseLengthPreference(options.length) ?? config.paraphrase.lengthPreference,
        antiDetection: options.antiDetection || config.paraphrase.antiDetection,
      });

      if (options.json) {
        console.log(JSON.stringify(toWireResult(result), null, 2));
      } else {
        printResult(result);
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
