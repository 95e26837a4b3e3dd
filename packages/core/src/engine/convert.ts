import { parseInputLine } from '../record/lines.js';
import type { AlignRecord } from '../types/index.js';
import type { AlignEngine } from './align-engine.js';

/**
 * Turn JSONL input lines into chained records. Blank lines are skipped; a
 * line's own `prev` overrides the running chain head for that record.
 */
export function convertLines(lines: Iterable<string>, engine: AlignEngine): AlignRecord[] {
  const chain = engine.chain();
  const records: AlignRecord[] = [];
  let lineNo = 0;

  for (const raw of lines) {
    lineNo++;
    const text = raw.trim();
    if (!text) continue;
    records.push(chain.append(parseInputLine(text, lineNo)).record);
  }

  return records;
}
