import { spawnSync } from 'child_process';
import type { Demangler, DemanglerAbi } from './types';
import type { Logger } from '../log';

const DEFAULT_COMMANDS = ['llvm-cxxfilt', 'c++filt'];

export function isItaniumMangled(symbol: string): boolean {
  return /^_Z/.test(symbol);
}

/**
 * Pair each input with its output line. A line equal to its input means the
 * tool could not demangle it. Returns null when the line count is off.
 */
export function parseCxxfiltOutput(symbols: readonly string[], stdout: string): Map<string, string | null> | null {
  const lines = stdout.replace(/\r/g, '').split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  if (lines.length !== symbols.length) return null;
  const out = new Map<string, string | null>();
  symbols.forEach((symbol, i) => {
    const line = lines[i];
    out.set(symbol, line && line !== symbol ? line : null);
  });
  return out;
}

export interface CxxfiltOptions {
  commands?: string[];
  timeoutMs?: number;
  logger?: Logger;
}

/** Itanium demangling through `llvm-cxxfilt` or `c++filt`, cached per symbol. */
export class CxxfiltDemangler implements Demangler {
  private readonly cache = new Map<string, string | null>();
  private readonly commands: string[];
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private unavailable = false;

  constructor(options: CxxfiltOptions = {}) {
    this.commands = options.commands ?? DEFAULT_COMMANDS;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger;
  }

  prime(symbols: readonly string[], abi: DemanglerAbi): void {
    if (abi !== 'itanium') return;
    const pending = Array.from(new Set(symbols.filter((s) => isItaniumMangled(s) && !this.cache.has(s))));
    if (pending.length === 0) return;
    const resolved = this.run(pending);
    for (const symbol of pending) {
      this.cache.set(symbol, resolved?.get(symbol) ?? null);
    }
  }

  demangle(symbol: string, abi: DemanglerAbi): string | null {
    if (abi !== 'itanium' || !isItaniumMangled(symbol)) return null;
    if (!this.cache.has(symbol)) this.prime([symbol], abi);
    return this.cache.get(symbol) ?? null;
  }

  private run(symbols: string[]): Map<string, string | null> | null {
    if (this.unavailable) return null;
    for (const command of this.commands) {
      const res = spawnSync(command, [], {
        input: symbols.join('\n') + '\n',
        encoding: 'utf-8',
        timeout: this.timeoutMs,
        maxBuffer: 64 * 1024 * 1024,
        windowsHide: true,
      });
      if (res.error || res.status !== 0) {
        this.logger?.debug('cxxfilt_failed', { command, status: res.status, err: res.error?.message });
        continue;
      }
      const parsed = parseCxxfiltOutput(symbols, res.stdout);
      if (parsed) return parsed;
      this.logger?.warn('cxxfilt_output_mismatch', { command, expected: symbols.length });
    }
    this.unavailable = true;
    this.logger?.warn('cxxfilt_unavailable', { commands: this.commands });
    return null;
  }
}
