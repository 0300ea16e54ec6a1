/**
 * lookup command - Show what the lexicon knows about a word
 */

import { Command } from 'commander';
import { loadLexicon } from '../../lexicon/loader.js';
import { lookupWord } from '../../lexicon/lookup.js';
import { errorMessage, resolveConfig } from '../options.js';

interface LookupCommandOptions {
  config?: string;
  json: boolean;
}

export const lookupCommand = new Command('lookup')
  .description('Show synonyms, antonyms, related words and examples for a word')
  .argument('<word>', 'Word to look up')
  .option('-c, --config <path>', 'Path to a config file')
  .option('--json', 'Output as JSON', false)
  .action(async (word: string, options: LookupCommandOptions) => {
    try {
      const config = await resolveConfig(options.config);
      const lexicon = await loadLexicon(config.lexicon);
      const result = lookupWord(lexicon, word);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      const sections = [
        ['Synonyms', result.synonyms],
        ['Antonyms', result.antonyms],
        ['Related', result.related],
        ['Examples', result.examples],
      ] as const;

      if (sections.every(([, values]) => values.length === 0)) {
        console.log(`No entries found for "${result.word}"`);
        return;
      }

      console.log(`${result.word}\n`);
      for (const [label, values] of sections) {
        if (values.length === 0) continue;
        console.log(`${label}:`);
        for (const value of values) {
          console.log(`  ${value}`);
        }
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
