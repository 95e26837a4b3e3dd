// Manifest views — annotated authoring template, effective dump, band card

import type { JsonObject, Manifest } from '../types/index.js';
import { DEFAULT_MANIFEST, bandTuples } from './bands.js';

/** Annotated starting point for authors. Loads back into DEFAULT_MANIFEST's bands. */
export function manifestTemplate(): JsonObject {
  return {
    manifest_id: DEFAULT_MANIFEST.manifestId,
    domain: 'Industrial/Mechanical',
    description:
      'Bearing health policy for Plant A, Line 3. Align via clamp->atanh->accumulate->tanh; ' +
      'bands carry escalation promises.',
    align_computation: {
      eps_a: DEFAULT_MANIFEST.epsA,
      eps_w: DEFAULT_MANIFEST.epsW,
      weights: 'uniform',
      pipeline: [
        'a_c := clamp(a_raw, -1+eps_a, +1-eps_a)',
        'u := atanh(a_c)',
        'U += w * u ; W += w',
        'align := tanh( U / max(W, eps_w) )',
      ],
    },
    bands: [
      { name: 'CRITICAL', align_min: -1.0, align_max: -0.8, action: 'stop/evacuate', window: 'human respond in <= 10 min' },
      { name: 'AMBER',    align_min: -0.8, align_max: -0.3, action: 'inspect',       window: 'inspect in <= 30 min' },
      { name: 'A0',       align_min: -0.3, align_max:  0.7, action: 'monitor only',  window: 'inspect in <= 8h' },
      { name: 'A++',      align_min:  0.7, align_max:  1.0, action: 'no action',     window: 'none' },
    ],
    escalation_owner: 'Plant Safety Officer',
    policy_author: 'Reliability Board',
    policy_version: 'v7',
    revision_notes: 'Updated AMBER window from 60 min to 30 min',
  };
}

/** Normalized manifest as a document; `loadManifest` reads it back unchanged. */
export function effectiveManifest(manifest: Manifest): JsonObject {
  return {
    manifest_id: manifest.manifestId,
    eps_a: manifest.epsA,
    eps_w: manifest.epsW,
    bands_tuple: bandTuples(manifest.declared).map(([name, lo, hi]) => [name, lo, hi]),
  };
}

export function formatBandCard(manifest: Manifest): string {
  const lines = [
    'Band Card — effective manifest',
    `manifest_id: ${manifest.manifestId}`,
    `eps_a: ${manifest.epsA}, eps_w: ${manifest.epsW}`,
  ];
  for (const band of manifest.bands) {
    const open = band.includesLower ? '[' : '(';
    lines.push(`- ${band.name}: ${open}${band.lower}, ${band.upper}]`);
  }
  return lines.join('\n');
}
