// JSONL line parsing — one input or record object per line

import type { z } from 'zod';
import { AlignInputError, formatIssues } from '../errors.js';
import { AlignInputLineZ, AlignRecordZ } from '../schema.js';
import type { AlignInput, AlignRecord } from '../types/index.js';

function parseLine<T>(schema: z.ZodType<T>, text: string, where: string): T {
  let data: unknown;
  try {
    data = JSON.parse(text) as unknown;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new AlignInputError(`${where}: invalid JSON (${reason})`, { cause: err });
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new AlignInputError(`${where}: ${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

/** `{"value":{...},"a_raw":[...],"weights"?:[...],"prev"?:"<hex>"}` → AlignInput */
export function parseInputLine(text: string, lineNo = 1): AlignInput {
  const line = parseLine(AlignInputLineZ, text, `line ${lineNo}`);
  return {
    value: line.value,
    series: line.a_raw,
    weights: line.weights,
    prev: line.prev ?? undefined,
  };
}

export function parseRecordLine(text: string, lineNo = 1): AlignRecord {
  return parseLine(AlignRecordZ, text, `line ${lineNo}`);
}
