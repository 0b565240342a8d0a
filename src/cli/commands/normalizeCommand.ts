import { Command } from 'commander';
import { executeHandler } from '../types';

export const normalizeCommand = new Command('normalize')
  .description('Print the canonical form of demangled names and whether the filter keeps them')
  .argument('<names...>', 'Demangled names (quote names containing spaces)')
  .option('-c, --config <file>', 'Filter config (default: ./xref.config.json when present)')
  .action(async (names, options) => {
    await executeHandler('normalize', { names, ...options });
  });
