import path from 'path';
import { findXrefs, loadXrefDump, lookupXref, XrefDumpError, type XrefDump } from '../../core/xrefs/dump';
import type { FindXrefsInput, QueryXrefInput } from '../schemas/querySchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorHints, ErrorReasons } from '../types';

async function openDump(file: string): Promise<XrefDump | CLIError> {
  try {
    return await loadXrefDump(file);
  } catch (e) {
    if (e instanceof XrefDumpError) {
      return error(ErrorReasons.DUMP_INVALID, {
        message: e.message,
        issues: e.issues,
        dump: file,
        hint: ErrorHints.DUMP_INVALID,
      });
    }
    throw e;
  }
}

export async function handleQueryXref(input: QueryXrefInput): Promise<CLIResult | CLIError> {
  const dumpPath = path.resolve(input.dump);
  const dump = await openDump(dumpPath);
  if (!(dump instanceof Map)) return dump;

  const hit = lookupXref(dump, input.name, { exact: input.exact });
  if (!hit) {
    return error(ErrorReasons.NOT_FOUND, {
      message: `No entry for ${input.name}`,
      dump: dumpPath,
      hint: 'Try "xref-graph find <prefix>" to list candidate names',
    });
  }

  return success({
    dump: dumpPath,
    query: input.name,
    name: hit.key,
    matchedBy: hit.matchedBy,
    CallCount: hit.entry.CallCount,
    Usages: hit.entry.Usages,
  });
}

export async function handleFindXrefs(input: FindXrefsInput): Promise<CLIResult | CLIError> {
  const dumpPath = path.resolve(input.dump);
  const dump = await openDump(dumpPath);
  if (!(dump instanceof Map)) return dump;

  const matches = findXrefs(dump, input.prefix, input.limit);
  return success({ dump: dumpPath, prefix: input.prefix, count: matches.length, matches });
}
