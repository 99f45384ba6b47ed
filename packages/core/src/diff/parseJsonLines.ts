import type { DiffEntry } from '@changetree/shared';
import { ParseError } from '../errors';
import { toSegments } from '../tree/paths';
import { diffRecordSchema, parseChangeFact } from './facts';
import { payloadFromFacts } from './payload';

/**
 * JSON lines output of an archive diff: either the raw text, already parsed
 * records, or a single record when the output held just one line.
 */
export type DiffJsonInput = string | readonly unknown[] | object;

/**
 * Parse `{"path": ..., "changes": [...]}` records into diff entries.
 * A malformed line, record or change fails the whole batch.
 */
export function parseDiffJsonLines(input: DiffJsonInput): DiffEntry[] {
  if (typeof input === 'string') {
    return input
      .split(/\r?\n/)
      .filter((line) => line.trim() !== '')
      .map((line) => parseDiffRecord(parseJsonLine(line), line));
  }

  const records: readonly unknown[] = Array.isArray(input) ? input : [input];
  return records.map((record) => parseDiffRecord(record, JSON.stringify(record) ?? String(record)));
}

export function parseDiffRecord(raw: unknown, source: string): DiffEntry {
  const result = diffRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new ParseError('Malformed diff record', source);
  }
  if (toSegments(result.data.path).length === 0) {
    throw new ParseError('Missing path in diff output', source);
  }

  const facts = result.data.changes.map((change) => parseChangeFact(change, source));
  return { path: result.data.path, payload: payloadFromFacts(facts) };
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ParseError('Invalid JSON in diff output', line);
    }
    throw error;
  }
}
