// Manifest loading — one validated entry point for objects, inline JSON and files
//
// Precedence for each epsilon:
//   align_computation.eps_*  >  top-level eps_*  >  built-in default
// Bands come from the first non-empty of `bands`, `bands_tuple`, then the
// default band set.

import { existsSync, readFileSync } from 'node:fs';
import type { z } from 'zod';
import { MANIFEST_ENV } from '../constants.js';
import { ManifestLoadError, formatIssues } from '../errors.js';
import { ManifestDocumentZ } from '../schema.js';
import type { BandObjectZ, BandTupleZ } from '../schema.js';
import type { Manifest } from '../types/index.js';
import { DEFAULT_MANIFEST, bandTuples, createManifest } from './bands.js';
import type { BandTuple } from './bands.js';

export type ManifestSource = string | Record<string, unknown>;

/** Environment snapshot handed in by an entry point; the core never reads process.env. */
export type ManifestEnv = Readonly<Record<string, string | undefined>>;

type BandEntry = z.infer<typeof BandObjectZ> | z.infer<typeof BandTupleZ>;

function bandsFromDocument(list: readonly BandEntry[] | undefined): BandTuple[] {
  if (!list) return [];
  return list.map((b) =>
    Array.isArray(b) ? b : ([b.name, b.align_min, b.align_max] as const),
  );
}

function readSource(source: string): unknown {
  if (existsSync(source)) {
    let text: string;
    try {
      text = readFileSync(source, 'utf-8');
    } catch (err) {
      throw new ManifestLoadError(`Cannot read manifest file ${source}`, [], { cause: err });
    }
    return parseJson(text, source);
  }
  return parseJson(source, 'inline manifest');
}

function parseJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManifestLoadError(`Invalid JSON in ${origin}: ${reason}`, [], { cause: err });
  }
}

/** Build a manifest from an already-parsed manifest document. */
export function manifestFromDocument(data: unknown): Manifest {
  const parsed = ManifestDocumentZ.safeParse(data);
  if (!parsed.success) {
    throw new ManifestLoadError(
      `Manifest does not match schema: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues,
    );
  }
  const doc = parsed.data;

  const fromBands = bandsFromDocument(doc.bands);
  const fromTuples = bandsFromDocument(doc.bands_tuple);
  const bands =
    fromBands.length > 0 ? fromBands
    : fromTuples.length > 0 ? fromTuples
    : bandTuples(DEFAULT_MANIFEST.declared);

  return createManifest({
    manifestId: doc.manifest_id ?? DEFAULT_MANIFEST.manifestId,
    bands,
    epsA: doc.align_computation?.eps_a ?? doc.eps_a ?? DEFAULT_MANIFEST.epsA,
    epsW: doc.align_computation?.eps_w ?? doc.eps_w ?? DEFAULT_MANIFEST.epsW,
  });
}

/**
 * Load a manifest from a parsed object, a path to a JSON file, or an inline
 * JSON string. A string naming an existing file is read; anything else is
 * parsed as JSON.
 */
export function loadManifest(source: ManifestSource): Manifest {
  return manifestFromDocument(typeof source === 'string' ? readSource(source) : source);
}

/** Explicit source, else BANDSTAMP_MANIFEST from `env`; undefined when neither is set. */
export function manifestFromSources(source: string | undefined, env: ManifestEnv = {}): Manifest | undefined {
  const chosen = source || env[MANIFEST_ENV];
  return chosen ? loadManifest(chosen) : undefined;
}

export function resolveManifest(source: string | undefined, env: ManifestEnv = {}): Manifest {
  return manifestFromSources(source, env) ?? DEFAULT_MANIFEST;
}
