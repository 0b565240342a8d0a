import fs from 'fs-extra';
import { z } from 'zod';
import { normalizeName } from '../normalize';
import { collapseGenerics, normalizeManagedName, normalizeXrefName } from '../managedNames';
import type { XrefEntry } from './serialize';

export class XrefDumpError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'XrefDumpError';
  }
}

const XrefDumpSchema = z.record(
  z.string(),
  z.object({
    CallCount: z.number().int().nonnegative(),
    Usages: z.array(z.string()),
  }),
);

export type XrefDump = Map<string, XrefEntry>;

export function parseXrefDump(raw: unknown): XrefDump {
  const parsed = XrefDumpSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new XrefDumpError('Invalid xref dump', issues);
  }
  return new Map(Object.entries(parsed.data));
}

export async function loadXrefDump(file: string): Promise<XrefDump> {
  let raw: unknown;
  try {
    raw = await fs.readJSON(file);
  } catch (e) {
    throw new XrefDumpError(`Cannot read xref dump ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseXrefDump(raw);
}

/**
 * Merge entries that differ only in their generic arguments: call counts
 * add up, usages are concatenated without repeats.
 */
export function collapseGenericEntries(dump: XrefDump): XrefDump {
  const out: XrefDump = new Map();
  for (const [key, entry] of dump) {
    if (!key.includes('<') || !key.includes('>')) continue;
    const collapsed = collapseGenerics(key);
    const existing = out.get(collapsed);
    if (!existing) {
      out.set(collapsed, { CallCount: entry.CallCount, Usages: Array.from(new Set(entry.Usages)) });
      continue;
    }
    existing.CallCount += entry.CallCount;
    const seen = new Set(existing.Usages);
    for (const usage of entry.Usages) {
      if (seen.has(usage)) continue;
      seen.add(usage);
      existing.Usages.push(usage);
    }
  }
  return out;
}

export type MatchKind = 'exact' | 'managed' | 'generic';

export interface XrefLookup {
  key: string;
  matchedBy: MatchKind;
  entry: XrefEntry;
}

/**
 * Find a function in a dump. The query is canonicalised first; unless
 * `exact`, its managed-metadata spelling and the generic-collapsed view of
 * the dump are tried next.
 */
export function lookupXref(dump: XrefDump, query: string, options: { exact?: boolean } = {}): XrefLookup | null {
  const canonical = normalizeName(query);
  const direct = dump.get(canonical);
  if (direct) return { key: canonical, matchedBy: 'exact', entry: direct };
  if (options.exact) return null;

  const managed = normalizeXrefName(normalizeManagedName(canonical));
  const viaManaged = dump.get(managed);
  if (viaManaged) return { key: managed, matchedBy: 'managed', entry: viaManaged };

  const collapsed = collapseGenericEntries(dump);
  for (const candidate of new Set([canonical, managed, collapseGenerics(canonical), collapseGenerics(managed)])) {
    const entry = collapsed.get(candidate);
    if (entry) return { key: candidate, matchedBy: 'generic', entry };
  }
  return null;
}

export interface XrefListing {
  name: string;
  callCount: number;
}

/** Dump keys starting with `prefix`, in dump order. */
export function findXrefs(dump: XrefDump, prefix: string, limit: number): XrefListing[] {
  const out: XrefListing[] = [];
  for (const [name, entry] of dump) {
    if (out.length >= limit) break;
    if (name.startsWith(prefix)) out.push({ name, callCount: entry.CallCount });
  }
  return out;
}
