import type { HandlerRegistration } from './types';
import { defineHandler } from './types';
import { DumpXrefsSchema } from './schemas/dumpSchemas';
import { FindXrefsSchema, QueryXrefSchema } from './schemas/querySchemas';
import { NormalizeNamesSchema } from './schemas/normalizeSchemas';
import { handleDumpXrefs } from './handlers/dumpHandlers';
import { handleFindXrefs, handleQueryXref } from './handlers/queryHandlers';
import { handleNormalizeNames } from './handlers/normalizeHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Maps command keys to their schema-bound handlers.
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  'dump': defineHandler(DumpXrefsSchema, handleDumpXrefs),
  'query': defineHandler(QueryXrefSchema, handleQueryXref),
  'find': defineHandler(FindXrefsSchema, handleFindXrefs),
  'normalize': defineHandler(NormalizeNamesSchema, handleNormalizeNames),
};
