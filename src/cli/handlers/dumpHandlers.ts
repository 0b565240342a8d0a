import path from 'path';
import { CxxfiltDemangler } from '../../core/engine/cxxfilt';
import { loadSnapshot, SnapshotFormatError, type SnapshotEngine } from '../../core/engine/snapshot';
import { createNameFilter } from '../../core/filter';
import { createLogger, serializeError } from '../../core/log';
import { buildXrefGraph } from '../../core/xrefs/builder';
import { writeXrefDocument } from '../../core/xrefs/serialize';
import type { DumpXrefsInput } from '../schemas/dumpSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorHints, ErrorReasons } from '../types';
import { isConfigError, resolveConfig } from '../helpers';

export async function handleDumpXrefs(input: DumpXrefsInput): Promise<CLIResult | CLIError> {
  const snapshotPath = path.resolve(input.snapshot);
  const log = createLogger({ component: 'cli', cmd: 'dump' });
  const startedAt = Date.now();

  const config = await resolveConfig(input.config, { abi: input.abi, output: input.out });
  if (isConfigError(config)) return config;

  const fallback = input.cxxfilt ? new CxxfiltDemangler({ logger: log }) : undefined;
  let engine: SnapshotEngine;
  try {
    engine = await loadSnapshot(snapshotPath, { fallback });
  } catch (e) {
    if (e instanceof SnapshotFormatError) {
      return error(ErrorReasons.SNAPSHOT_INVALID, {
        message: e.message,
        issues: e.issues,
        snapshot: snapshotPath,
        hint: ErrorHints.SNAPSHOT_INVALID,
      });
    }
    throw e;
  }
  fallback?.prime(engine.unresolvedSymbols(config.abi), config.abi);

  const { result, stats } = buildXrefGraph(engine, {
    filter: createNameFilter(config),
    abi: config.abi,
    logger: log.child({ snapshot: snapshotPath }),
  });

  const output = path.resolve(config.output);
  let bytes: number;
  try {
    bytes = await writeXrefDocument(output, result);
  } catch (e) {
    log.error('xref_write_failed', { output, err: serializeError(e) });
    return error(ErrorReasons.WRITE_FAILED, {
      message: e instanceof Error ? e.message : String(e),
      output,
      hint: ErrorHints.WRITE_FAILED,
    });
  }

  log.info('xref_dump', {
    ok: true,
    snapshot: snapshotPath,
    output,
    abi: config.abi,
    functions: result.size,
    bytes,
    errors: stats.errors,
    duration_ms: Date.now() - startedAt,
  });

  return success({
    snapshot: snapshotPath,
    output,
    abi: config.abi,
    functions: result.size,
    bytes,
    stats,
  });
}
