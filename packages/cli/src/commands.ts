// CLI command bodies — file and console I/O around @bandstamp/core.
// Each returns the text to print (and an exit code where it matters) so the
// yargs wiring in index.ts stays thin.

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import {
  AlignInputError,
  JsonObjectZ,
  canonicalJson,
  convertLines,
  effectiveManifest,
  formatIssues,
  generateExamples,
  manifestTemplate,
  parseRecordLine,
  selfCheck,
  validateManifest,
  verifyChain,
} from '@bandstamp/core';
import type {
  AlignEngine,
  AlignRecord,
  ChainReport,
  CheckResult,
  JsonValue,
  Manifest,
} from '@bandstamp/core';

export interface CommandResult {
  text: string;
  exitCode: number;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

async function writeText(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, 'utf-8');
}

function toJsonl(records: readonly AlignRecord[]): string {
  return records.map((r) => canonicalJson(r)).join('\n') + (records.length > 0 ? '\n' : '');
}

function parseFlag<T>(schema: z.ZodType<T>, raw: string, flag: string): T {
  let data: unknown;
  try {
    data = JSON.parse(raw) as unknown;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new AlignInputError(`--${flag} is not valid JSON: ${reason}`, { cause: err });
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new AlignInputError(`--${flag}: ${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

export function formatJson(value: JsonValue, pretty = false): string {
  return pretty ? JSON.stringify(value, null, 2) : canonicalJson(value);
}

// ── Manifest ──────────────────────────────────────────────────────────────────

export function manifestValidate(manifest: Manifest): CommandResult {
  const { ok, messages } = validateManifest(manifest);
  const lines = [`MANIFEST VALIDATION: ${ok ? 'PASS' : 'FAIL'}`, ...messages.map((m) => `- ${m}`)];
  return { text: lines.join('\n'), exitCode: ok ? 0 : 2 };
}

export async function manifestDump(path: string, manifest: Manifest): Promise<string> {
  await writeText(path, JSON.stringify(effectiveManifest(manifest), null, 2) + '\n');
  return `Wrote effective manifest: ${path}`;
}

export async function manifestWriteTemplate(path: string): Promise<string> {
  await writeText(path, JSON.stringify(manifestTemplate(), null, 2) + '\n');
  return `Wrote manifest template: ${path}`;
}

// ── Records ───────────────────────────────────────────────────────────────────

export interface RecordArgs {
  value: string;
  aRaw: string;
  weights?: string;
  prev?: string;
}

const SeriesZ = z.array(z.number().finite()).min(1);
const WeightsZ = z.array(z.number().finite().nonnegative()).min(1);

export function singleRecord(engine: AlignEngine, args: RecordArgs): AlignRecord {
  const value = parseFlag(JsonObjectZ, args.value, 'value');
  const series = parseFlag(SeriesZ, args.aRaw, 'a_raw');
  const weights = args.weights ? parseFlag(WeightsZ, args.weights, 'weights') : undefined;
  return engine.build({ value, series, weights, prev: args.prev || undefined }).record;
}

export async function writeExamples(
  path: string,
  engine: AlignEngine,
  options: { count?: number; seed?: number },
): Promise<string> {
  const records = generateExamples(engine, options);
  await writeText(path, toJsonl(records));
  return `Wrote ${records.length} examples: ${path}`;
}

export async function convertFile(inPath: string, outPath: string, engine: AlignEngine): Promise<string> {
  const text = await readFile(inPath, 'utf-8');
  const records = convertLines(text.split('\n'), engine);
  await writeText(outPath, toJsonl(records));
  return `Converted ${records.length} record(s) -> ${outPath}`;
}

// ── Verification ──────────────────────────────────────────────────────────────

export async function readRecords(path: string): Promise<AlignRecord[]> {
  const text = await readFile(path, 'utf-8');
  const records: AlignRecord[] = [];
  text.split('\n').forEach((line, i) => {
    if (line.trim()) records.push(parseRecordLine(line, i + 1));
  });
  return records;
}

export function formatChainReport(report: ChainReport): CommandResult {
  const lines = [`CHAIN VERIFICATION: ${report.ok ? 'PASS' : 'FAIL'} (${report.checked} record(s))`];
  for (const issue of report.issues) {
    lines.push(`- record ${issue.index}: ${issue.message}`);
  }
  return { text: lines.join('\n'), exitCode: report.ok ? 0 : 2 };
}

export async function verifyFile(
  path: string,
  manifest: Manifest | undefined,
  continuity: boolean,
): Promise<CommandResult> {
  const records = await readRecords(path);
  return formatChainReport(verifyChain(records, { manifest, continuity }));
}

export function formatChecks(results: readonly CheckResult[]): CommandResult {
  const ok = results.every((r) => r.ok);
  const lines = results.map((r) => `${r.name}: ${r.ok ? 'PASS' : 'FAIL'}`);
  lines.push('', ok ? 'ALL CHECKS PASSED' : 'ONE OR MORE CHECKS FAILED');
  return { text: lines.join('\n'), exitCode: ok ? 0 : 2 };
}

export function runChecks(manifest: Manifest): CommandResult {
  return formatChecks(selfCheck(manifest));
}
