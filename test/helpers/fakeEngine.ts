import type { Address, AnalysisEngine, DemanglerAbi } from '../../src/core/engine/types';

/** In-memory analysis engine. Call sites live a few bytes into their caller. */
export class FakeEngine implements AnalysisEngine {
  readonly demangleCalls: string[] = [];
  private readonly order: Address[] = [];
  private readonly code = new Set<Address>();
  private readonly symbols = new Map<Address, string | null>();
  private readonly owners = new Map<Address, Address>();
  private readonly refs = new Map<Address, Address[]>();
  private readonly demangled = new Map<string, string | null>();
  private readonly broken = new Set<Address>();

  addFunction(address: Address, symbol: string | null, demangled?: string | null, options: { code?: boolean } = {}): this {
    this.order.push(address);
    if (options.code !== false) this.code.add(address);
    this.symbols.set(address, symbol);
    this.owners.set(address, address);
    if (symbol !== null && demangled !== undefined) this.demangled.set(symbol, demangled);
    return this;
  }

  addCall(caller: Address, callee: Address, offset = 4): this {
    const origin = caller + offset;
    this.code.add(origin);
    this.owners.set(origin, caller);
    this.push(callee, origin);
    return this;
  }

  addDataReference(from: Address, to: Address): this {
    this.push(to, from);
    return this;
  }

  /** Make every symbol query for `address` throw. */
  breakAt(address: Address): this {
    this.broken.add(address);
    return this;
  }

  enumerateFunctions(): Iterable<Address> {
    return this.order;
  }

  isCode(address: Address): boolean {
    return this.code.has(address);
  }

  getRawSymbol(address: Address): string | null {
    if (this.broken.has(address)) throw new Error(`symbol table read failed at ${address}`);
    return this.symbols.get(address) ?? null;
  }

  enumerateReferencesTo(address: Address): Iterable<Address> {
    return this.refs.get(address) ?? [];
  }

  enclosingFunctionSymbol(address: Address): string | null {
    const owner = this.owners.get(address);
    return owner === undefined ? null : this.symbols.get(owner) ?? null;
  }

  demangle(symbol: string, _abi: DemanglerAbi): string | null {
    this.demangleCalls.push(symbol);
    return this.demangled.get(symbol) ?? null;
  }

  private push(to: Address, from: Address): void {
    const list = this.refs.get(to);
    if (list) list.push(from);
    else this.refs.set(to, [from]);
  }
}
