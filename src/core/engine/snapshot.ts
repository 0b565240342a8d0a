import fs from 'fs-extra';
import { z } from 'zod';
import { formatAddress } from '../log';
import type { Address, AnalysisEngine, Demangler, DemanglerAbi } from './types';

export class SnapshotFormatError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'SnapshotFormatError';
  }
}

const HexAddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]+$/, 'Expected a 0x-prefixed hex address')
  .transform((s) => Number.parseInt(s.slice(2), 16));

const AddressSchema = z
  .union([z.number().int().nonnegative(), HexAddressSchema])
  .pipe(z.number().max(Number.MAX_SAFE_INTEGER, 'Address does not fit in a safe integer'));

const FunctionSchema = z
  .object({
    start: AddressSchema,
    end: AddressSchema.optional(),
    name: z.string().nullable().optional(),
    code: z.boolean().default(true),
  })
  .refine((f) => f.end === undefined || f.end > f.start, 'Function end must be greater than start');

const ReferenceSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
});

const FunctionListSchema = z.array(FunctionSchema).superRefine((functions, ctx) => {
  const seen = new Map<Address, number>();
  functions.forEach((fn, index) => {
    const first = seen.get(fn.start);
    if (first === undefined) {
      seen.set(fn.start, index);
      return;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [index, 'start'],
      message: `Duplicate function start ${formatAddress(fn.start)} (first at functions.${first})`,
    });
  });
});

export const SnapshotSchema = z.object({
  functions: FunctionListSchema,
  references: z.array(ReferenceSchema).default([]),
  demangled: z.record(z.string(), z.record(z.string(), z.string().nullable())).default({}),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

interface FunctionRange {
  start: Address;
  end: Address;
  name: string | null;
  code: boolean;
}

export interface SnapshotEngineOptions {
  /** Consulted when the snapshot has no demangled entry for a symbol. */
  fallback?: Demangler;
}

/** Analysis engine over an exported analysis database. */
export class SnapshotEngine implements AnalysisEngine {
  private readonly order: Address[] = [];
  private readonly byStart = new Map<Address, FunctionRange>();
  private readonly ranges: FunctionRange[];
  /** maxEnd[i] is the largest `end` among ranges[0..i]. */
  private readonly maxEnd: Address[] = [];
  private readonly referencesTo = new Map<Address, Address[]>();
  private readonly demangled = new Map<string, Map<string, string | null>>();
  private readonly fallback?: Demangler;

  constructor(snapshot: Snapshot, options: SnapshotEngineOptions = {}) {
    this.fallback = options.fallback;

    for (const fn of snapshot.functions) {
      const range: FunctionRange = {
        start: fn.start,
        end: fn.end ?? fn.start + 1,
        name: fn.name ?? null,
        code: fn.code,
      };
      this.order.push(range.start);
      this.byStart.set(range.start, range);
    }

    this.ranges = Array.from(this.byStart.values()).sort((a, b) => a.start - b.start);
    let running = -1;
    for (const range of this.ranges) {
      running = Math.max(running, range.end);
      this.maxEnd.push(running);
    }

    for (const ref of snapshot.references) {
      const origins = this.referencesTo.get(ref.to);
      if (origins) origins.push(ref.from);
      else this.referencesTo.set(ref.to, [ref.from]);
    }

    for (const [abi, table] of Object.entries(snapshot.demangled)) {
      this.demangled.set(abi, new Map(Object.entries(table)));
    }
  }

  enumerateFunctions(): Iterable<Address> {
    return this.order;
  }

  isCode(address: Address): boolean {
    return this.findCovering(address)?.code === true;
  }

  getRawSymbol(address: Address): string | null {
    return this.byStart.get(address)?.name ?? null;
  }

  enumerateReferencesTo(address: Address): Iterable<Address> {
    return this.referencesTo.get(address) ?? [];
  }

  enclosingFunctionSymbol(address: Address): string | null {
    return this.findCovering(address)?.name ?? null;
  }

  demangle(symbol: string, abi: DemanglerAbi): string | null {
    const table = this.demangled.get(abi);
    if (table?.has(symbol)) return table.get(symbol) ?? null;
    return this.fallback?.demangle(symbol, abi) ?? null;
  }

  /** Distinct function names the snapshot carries no demangled form for. */
  unresolvedSymbols(abi: DemanglerAbi): string[] {
    const table = this.demangled.get(abi);
    const out = new Set<string>();
    for (const range of this.ranges) {
      if (range.name && !table?.has(range.name)) out.add(range.name);
    }
    return Array.from(out);
  }

  /** Innermost (latest-starting) function whose range contains `address`. */
  private findCovering(address: Address): FunctionRange | undefined {
    let lo = 0;
    let hi = this.ranges.length - 1;
    let last = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.ranges[mid].start <= address) {
        last = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    for (let i = last; i >= 0 && this.maxEnd[i] > address; i--) {
      const range = this.ranges[i];
      if (address < range.end) return range;
    }
    return undefined;
  }
}

export function parseSnapshot(raw: unknown): Snapshot {
  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new SnapshotFormatError('Invalid analysis snapshot', issues);
  }
  return parsed.data;
}

export async function loadSnapshot(file: string, options: SnapshotEngineOptions = {}): Promise<SnapshotEngine> {
  let raw: unknown;
  try {
    raw = await fs.readJSON(file);
  } catch (e) {
    throw new SnapshotFormatError(`Cannot read snapshot ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return new SnapshotEngine(parseSnapshot(raw), options);
}
