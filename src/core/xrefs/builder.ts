import type { Address, AnalysisEngine, DemanglerAbi } from '../engine/types';
import type { NameFilter } from '../filter';
import { formatAddress, serializeError, type Logger } from '../log';
import { normalizeName } from '../normalize';
import { collectCallers } from './collector';
import { XrefResultSet, type CallRecord } from './resultSet';

export interface BuildOptions {
  filter: NameFilter;
  abi: DemanglerAbi;
  logger: Logger;
}

export interface BuildStats {
  functions: number;
  recorded: number;
  skippedNotCode: number;
  skippedNoSymbol: number;
  skippedQualifiedSymbol: number;
  skippedDemangleFailed: number;
  rejectedByFilter: number;
  droppedCallers: number;
  errors: number;
  collisions: number;
}

export interface BuildResult {
  result: XrefResultSet;
  stats: BuildStats;
}

function emptyStats(): BuildStats {
  return {
    functions: 0,
    recorded: 0,
    skippedNotCode: 0,
    skippedNoSymbol: 0,
    skippedQualifiedSymbol: 0,
    skippedDemangleFailed: 0,
    rejectedByFilter: 0,
    droppedCallers: 0,
    errors: 0,
    collisions: 0,
  };
}

/** Orders strings by Unicode code point rather than UTF-16 code unit. */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

type Outcome = { kind: 'record'; record: CallRecord } | { kind: 'skip'; stat: keyof BuildStats };

class XrefGraphBuilder {
  private readonly result = new XrefResultSet();
  private readonly stats = emptyStats();

  constructor(private readonly engine: AnalysisEngine, private readonly options: BuildOptions) {}

  run(): BuildResult {
    const log = this.options.logger;
    for (const address of this.engine.enumerateFunctions()) {
      this.stats.functions++;
      let outcome: Outcome;
      try {
        outcome = this.process(address);
      } catch (e) {
        this.stats.errors++;
        log.error('xref_function_failed', { address: formatAddress(address), err: serializeError(e) });
        continue;
      }

      if (outcome.kind === 'skip') {
        this.stats[outcome.stat]++;
        continue;
      }

      const previous = this.result.set(outcome.record);
      this.stats.recorded++;
      if (previous) {
        this.stats.collisions++;
        log.warn('xref_name_collision', {
          name: outcome.record.name,
          address: formatAddress(address),
          replacedCallCount: previous.callCount,
        });
      }
    }
    return { result: this.result, stats: this.stats };
  }

  private process(address: Address): Outcome {
    const { engine } = this;
    const { filter, abi } = this.options;

    if (!engine.isCode(address)) return { kind: 'skip', stat: 'skippedNotCode' };

    const symbol = engine.getRawSymbol(address);
    if (!symbol) return { kind: 'skip', stat: 'skippedNoSymbol' };
    // Already-qualified labels are internal, not top-level functions.
    if (symbol.includes('::')) return { kind: 'skip', stat: 'skippedQualifiedSymbol' };

    const demangled = engine.demangle(symbol, abi);
    if (!demangled) return { kind: 'skip', stat: 'skippedDemangleFailed' };

    const name = normalizeName(demangled);
    if (!filter.isApplicationCode(name)) return { kind: 'skip', stat: 'rejectedByFilter' };

    const collected = collectCallers(engine, address, abi);
    const callers = collected.filter((caller) => filter.isApplicationCode(caller)).sort(compareCodePoints);
    this.stats.droppedCallers += collected.length - callers.length;

    return { kind: 'record', record: { name, callCount: callers.length, callers } };
  }
}

/**
 * One pass over every function the engine reports, producing the filtered
 * caller graph. A function whose processing throws is logged and skipped.
 */
export function buildXrefGraph(engine: AnalysisEngine, options: BuildOptions): BuildResult {
  return new XrefGraphBuilder(engine, options).run();
}
