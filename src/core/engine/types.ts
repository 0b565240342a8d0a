/** Start address of a code item in the analysed binary. */
export type Address = number;

export const DEMANGLER_ABIS = ['msvc', 'itanium'] as const;

/** Demangling convention, fixed for a whole run. */
export type DemanglerAbi = (typeof DEMANGLER_ABIS)[number];

export interface Demangler {
  demangle(symbol: string, abi: DemanglerAbi): string | null;
  /** Optional batch warm-up so implementations backed by a process can demangle many names at once. */
  prime?(symbols: readonly string[], abi: DemanglerAbi): void;
}

/**
 * Read-only queries against one binary's analysis database.
 *
 * Everything the call-graph builder needs from a disassembler goes through
 * this interface, so the builder runs the same against an exported snapshot
 * or an in-memory fake.
 */
export interface AnalysisEngine extends Demangler {
  enumerateFunctions(): Iterable<Address>;
  isCode(address: Address): boolean;
  getRawSymbol(address: Address): string | null;
  /** Origins of every cross-reference to `address`, code and data alike. */
  enumerateReferencesTo(address: Address): Iterable<Address>;
  enclosingFunctionSymbol(address: Address): string | null;
}
