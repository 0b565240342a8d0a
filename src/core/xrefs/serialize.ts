import path from 'path';
import fs from 'fs-extra';
import type { ReadonlyXrefResultSet } from './resultSet';

export interface XrefEntry {
  CallCount: number;
  Usages: string[];
}

function indentTail(json: string, indent: string): string {
  return json.replace(/\n/g, `\n${indent}`);
}

/**
 * JSON text of the result set, keys in insertion order, 2-space indent,
 * non-ASCII characters written as-is.
 */
export function renderXrefDocument(result: ReadonlyXrefResultSet): string {
  const members: string[] = [];
  for (const record of result) {
    const entry: XrefEntry = { CallCount: record.callCount, Usages: record.callers };
    members.push(`  ${JSON.stringify(record.name)}: ${indentTail(JSON.stringify(entry, null, 2), '  ')}`);
  }
  if (members.length === 0) return '{}';
  return `{\n${members.join(',\n')}\n}`;
}

/** Writes the document, replacing any existing file. Resolves to the number of bytes written. */
export async function writeXrefDocument(outputPath: string, result: ReadonlyXrefResultSet): Promise<number> {
  const text = renderXrefDocument(result);
  await fs.ensureDir(path.dirname(outputPath));
  await fs.writeFile(outputPath, text, 'utf-8');
  return Buffer.byteLength(text, 'utf-8');
}
