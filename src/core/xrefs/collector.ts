import type { Address, AnalysisEngine, DemanglerAbi } from '../engine/types';
import { normalizeName } from '../normalize';

/**
 * Canonical names of the functions that reference `target` from code.
 *
 * One entry per reported reference, in engine order. Data references and
 * callers that cannot be resolved or demangled are skipped. Filtering,
 * sorting and counting are left to the builder.
 */
export function collectCallers(engine: AnalysisEngine, target: Address, abi: DemanglerAbi): string[] {
  const callers: string[] = [];
  for (const origin of engine.enumerateReferencesTo(target)) {
    if (!engine.isCode(origin)) continue;
    const symbol = engine.enclosingFunctionSymbol(origin);
    if (!symbol) continue;
    const demangled = engine.demangle(symbol, abi);
    if (!demangled) continue;
    callers.push(normalizeName(demangled));
  }
  return callers;
}
