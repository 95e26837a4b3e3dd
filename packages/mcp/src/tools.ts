// Tool definitions for the bandstamp MCP server. Handlers are plain functions
// so they can be exercised without a transport.

import { z } from 'zod';
import {
  AlignEngine,
  AlignInputError,
  JsonObjectZ,
  ManifestLoadError,
  canonicalJson,
  formatBandCard,
  manifestFromSources,
  parseRecordLine,
  resolveManifest,
  validateManifest,
  verifyChain,
} from '@bandstamp/core';
import type { AlignRecord, Clock, Manifest } from '@bandstamp/core';

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function text(body: string): ToolResult {
  return { content: [{ type: 'text', text: body }] };
}

// Input errors become tool errors the model can read; anything else propagates
function asToolError(err: unknown): ToolResult {
  if (err instanceof AlignInputError || err instanceof ManifestLoadError) {
    return { ...text(`Error: ${err.message}`), isError: true };
  }
  throw err;
}

const manifestArg = z
  .string()
  .optional()
  .describe('Manifest JSON string or file path. Defaults to BANDSTAMP_MANIFEST, then the built-in manifest.');

function manifestFor(source: string | undefined): Manifest {
  return resolveManifest(source, process.env);
}

// ── align_record ──────────────────────────────────────────────────────────────

export const alignRecordInput = {
  value: JsonObjectZ.describe('JSON object payload carried verbatim in the record.'),
  a_raw: z
    .array(z.number().finite())
    .min(1)
    .describe('Raw alignment observations; each is clamped into (-1, 1) before fusion.'),
  weights: z
    .array(z.number().finite().nonnegative())
    .optional()
    .describe('Non-negative per-observation weights, same length as a_raw.'),
  prev: z.string().optional().describe('Digest of the previous record stamp, to extend a chain.'),
  manifest: manifestArg,
};

export type AlignRecordArgs = z.infer<z.ZodObject<typeof alignRecordInput>>;

export function alignRecord(args: AlignRecordArgs, clock?: Clock): ToolResult {
  try {
    const engine = new AlignEngine({ manifest: manifestFor(args.manifest), clock });
    const { record, digest } = engine.build({
      value: args.value,
      series: args.a_raw,
      weights: args.weights,
      prev: args.prev,
    });
    return text([canonicalJson(record), '', `next prev: ${digest}`].join('\n'));
  } catch (err) {
    return asToolError(err);
  }
}

// ── validate_manifest ─────────────────────────────────────────────────────────

export const manifestInput = { manifest: manifestArg };

export type ManifestArgs = z.infer<z.ZodObject<typeof manifestInput>>;

export function validateManifestTool(args: ManifestArgs): ToolResult {
  try {
    const manifest = manifestFor(args.manifest);
    const { ok, messages } = validateManifest(manifest);
    const lines = [`**${manifest.manifestId}**: ${ok ? 'PASS' : 'FAIL'}`, ...messages.map((m) => `- ${m}`)];
    return text(lines.join('\n'));
  } catch (err) {
    return asToolError(err);
  }
}

// ── band_card ─────────────────────────────────────────────────────────────────

export function bandCard(args: ManifestArgs): ToolResult {
  try {
    return text(formatBandCard(manifestFor(args.manifest)));
  } catch (err) {
    return asToolError(err);
  }
}

// ── verify_chain ──────────────────────────────────────────────────────────────

export const verifyChainInput = {
  records: z.string().describe('Records as JSONL, one emitted record per line, in chain order.'),
  continuity: z.boolean().optional().describe('Check that each prev references the record before it. Default: true'),
  manifest: manifestArg,
};

export type VerifyChainArgs = z.infer<z.ZodObject<typeof verifyChainInput>>;

export function verifyChainTool(args: VerifyChainArgs): ToolResult {
  try {
    const records: AlignRecord[] = [];
    args.records.split('\n').forEach((line, i) => {
      if (line.trim()) records.push(parseRecordLine(line, i + 1));
    });
    const manifest = manifestFromSources(args.manifest, process.env);
    const report = verifyChain(records, { manifest, continuity: args.continuity ?? true });
    const lines = [`CHAIN VERIFICATION: ${report.ok ? 'PASS' : 'FAIL'} (${report.checked} record(s))`];
    for (const issue of report.issues) lines.push(`- record ${issue.index}: ${issue.message}`);
    return text(lines.join('\n'));
  } catch (err) {
    return asToolError(err);
  }
}
