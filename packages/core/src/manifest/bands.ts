import { EPS, UNBANDED } from '../constants.js';
import type { Band, Manifest } from '../types/index.js';
// Band model — interval descriptors, manifest construction and lookup

/** A band as authored: (name, lower, upper). */
export type BandTuple = readonly [name: string, lower: number, upper: number];

export interface ManifestInit {
  manifestId: string;
  bands: readonly BandTuple[];
  epsA?: number;
  epsW?: number;
}

/**
 * Build an immutable manifest. Bands keep their declaration order in
 * `declared`; `bands` holds them sorted ascending by upper bound for lookup.
 * The band with the smallest lower bound is marked `includesLower`.
 */
export function createManifest(init: ManifestInit): Manifest {
  let lowest = -1;
  init.bands.forEach(([, lower], i) => {
    const current = init.bands[lowest];
    if (current === undefined || lower < current[1]) lowest = i;
  });

  const declared: Band[] = init.bands.map(([name, lower, upper], i) =>
    Object.freeze({ name, lower, upper, includesLower: i === lowest }),
  );
  const sorted = [...declared].sort((a, b) => a.upper - b.upper);

  return Object.freeze({
    manifestId: init.manifestId,
    declared: Object.freeze(declared),
    bands: Object.freeze(sorted),
    epsA: init.epsA ?? EPS.A,
    epsW: init.epsW ?? EPS.W,
  });
}

/** Half-open (lower, upper], or closed [lower, upper] for the lowest band. */
export function bandContains(band: Band, score: number): boolean {
  if (score > band.upper) return false;
  return band.includesLower ? score >= band.lower : score > band.lower;
}

/** Name of the first band (ascending by upper bound) containing `score`, else UNBANDED. */
export function pickBand(manifest: Manifest, score: number): string {
  for (const band of manifest.bands) {
    if (bandContains(band, score)) return band.name;
  }
  return UNBANDED;
}

export function bandTuples(bands: readonly Band[]): BandTuple[] {
  return bands.map((b) => [b.name, b.lower, b.upper] as const);
}

// ─── Default manifest ─────────────────────────────────────────────────────────

export const DEFAULT_MANIFEST: Manifest = createManifest({
  manifestId: 'PLANT_A_BEARING_SAFETY_v7',
  bands: [
    ['CRITICAL', -1.0, -0.8],
    ['AMBER',    -0.8, -0.3],
    ['A0',       -0.3,  0.7],
    ['A++',       0.7,  1.0],
  ],
});
