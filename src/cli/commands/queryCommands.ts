import { Command } from 'commander';
import { executeHandler } from '../types';

export const queryCommand = new Command('query')
  .description('Look up the callers of a function in an xref dump')
  .argument('<name>', 'Function name (demangled, canonical or managed spelling)')
  .option('-d, --dump <file>', 'Xref dump to read', 'xref_data.json')
  .option('--exact', 'Only match the canonical name', false)
  .action(async (name, options) => {
    await executeHandler('query', { name, ...options });
  });

export const findCommand = new Command('find')
  .description('List functions in an xref dump by name prefix')
  .argument('<prefix>', 'Canonical name prefix (case-sensitive)')
  .option('-d, --dump <file>', 'Xref dump to read', 'xref_data.json')
  .option('--limit <n>', 'Limit results', '200')
  .action(async (prefix, options) => {
    await executeHandler('find', { prefix, ...options });
  });
