import { Command } from 'commander';
import { executeHandler } from '../types';

export const dumpCommand = new Command('dump')
  .description('Build the filtered call-reference graph from an analysis snapshot and write xref_data.json')
  .argument('<snapshot>', 'Analysis database export (JSON)')
  .option('-c, --config <file>', 'Filter/ABI/output config (default: ./xref.config.json when present)')
  .option('--abi <abi>', 'Demangler ABI: msvc|itanium')
  .option('-o, --out <file>', 'Output file (default: xref_data.json)')
  .option('--cxxfilt', 'Demangle Itanium symbols missing from the snapshot with llvm-cxxfilt/c++filt', false)
  .action(async (snapshot, options) => {
    await executeHandler('dump', { snapshot, ...options });
  });
