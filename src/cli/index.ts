#!/usr/bin/env node

/**
 * lexiphrase CLI
 */

import { Command } from 'commander';
import { bulkCommand } from './commands/bulk.js';
import { lookupCommand } from './commands/lookup.js';
import { paraphraseCommand } from './commands/paraphrase.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('lexiphrase')
  .description('lexiphrase - word lookup and paraphrase generation')
  .version('1.0.0');

// Register commands
program.addCommand(lookupCommand);
program.addCommand(paraphraseCommand);
program.addCommand(bulkCommand);
program.addCommand(serveCommand);

program.parse(process.argv);
