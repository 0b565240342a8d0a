#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { dumpCommand } from '../src/cli/commands/dumpCommand';
import { findCommand, queryCommand } from '../src/cli/commands/queryCommands';
import { normalizeCommand } from '../src/cli/commands/normalizeCommand';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readVersionFromPackageJson(): string {
  const pkgPath = findPackageJson(__dirname);
  if (!pkgPath) return '0.0.0';
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

async function main(): Promise<void> {
  const program = new Command();
  program
    .name('xref-graph')
    .description('xref-graph: application-level call-reference graphs from binary analysis snapshots')
    .version(readVersionFromPackageJson());

  program.addCommand(dumpCommand);
  program.addCommand(queryCommand);
  program.addCommand(findCommand);
  program.addCommand(normalizeCommand);
  await program.parseAsync(process.argv);
}

main().catch((e) => {
  process.stderr.write(`${e instanceof Error ? e.stack ?? e.message : String(e)}\n`);
  process.exit(1);
});
