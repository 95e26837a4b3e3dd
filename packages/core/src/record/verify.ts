import { pickBand } from '../manifest/bands.js';
import { canonicalJson, sha256Hex } from '../stamp/canonical.js';
import { parseStamp, stampDigest } from '../stamp/stamper.js';
import type { AlignRecord, ChainReport, Manifest, RecordIssue } from '../types/index.js';
import { recordCore } from './builder.js';

export interface VerifyOptions {
  /** Also check manifest_id and band against this manifest. */
  manifest?: Manifest;
  /** Require record N+1's prev to reference record N's stamp (default: true). */
  continuity?: boolean;
}

/** Problems with a single record, empty when it checks out. */
export function verifyRecord(record: AlignRecord, manifest?: Manifest): string[] {
  const problems: string[] = [];

  if (!(record.align > -1 && record.align < 1)) {
    problems.push(`align ${record.align} is outside (-1, 1)`);
  }

  const parts = parseStamp(record.stamp);
  if (!parts) {
    problems.push('stamp does not match the SSMCLOCK1 grammar');
  } else if (parts.digest !== sha256Hex(canonicalJson(recordCore(record)))) {
    problems.push('content digest does not match record fields');
  }

  if (manifest) {
    if (record.manifest_id !== manifest.manifestId) {
      problems.push(`manifest_id '${record.manifest_id}' differs from '${manifest.manifestId}'`);
    }
    const expected = pickBand(manifest, record.align);
    if (record.band !== expected) {
      problems.push(`band '${record.band}' differs from manifest band '${expected}'`);
    }
  }

  return problems;
}

/** Verify every record and, unless disabled, the prev links between them. */
export function verifyChain(
  records: readonly AlignRecord[],
  options: VerifyOptions = {},
): ChainReport {
  const { manifest, continuity = true } = options;
  const issues: RecordIssue[] = [];

  records.forEach((record, index) => {
    for (const message of verifyRecord(record, manifest)) {
      issues.push({ index, message });
    }

    const previous = records[index - 1];
    if (continuity && previous) {
      const expected = stampDigest(previous.stamp);
      const actual = parseStamp(record.stamp)?.prev ?? null;
      if (actual !== expected) {
        issues.push({ index, message: `prev does not reference record ${index - 1}` });
      }
    }
  });

  return { ok: issues.length === 0, checked: records.length, issues };
}
