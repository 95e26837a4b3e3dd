import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MANIFEST,
  bandContains,
  createManifest,
  pickBand,
} from '../manifest/bands.js';
import { loadManifest, manifestFromSources, resolveManifest } from '../manifest/load.js';
import { validateManifest } from '../manifest/validate.js';
import { effectiveManifest, formatBandCard, manifestTemplate } from '../manifest/template.js';
import { ManifestLoadError } from '../errors.js';
import { UNBANDED } from '../constants.js';
import type { BandTuple } from '../manifest/bands.js';

// ── Helpers ───────────────────────────────────────────────────────────────────
const manifestOf = (...bands: BandTuple[]) => createManifest({ manifestId: 'TEST_v1', bands });

// ── createManifest ────────────────────────────────────────────────────────────
describe('createManifest', () => {
  it('flags only the globally lowest band as closed at its lower bound', () => {
    const m = manifestOf(['HIGH', 0, 1], ['LOW', -1, 0]);
    expect(m.declared.map((b) => [b.name, b.includesLower])).toEqual([
      ['HIGH', false],
      ['LOW', true],
    ]);
  });

  it('keeps declaration order and sorts lookup order by upper bound', () => {
    const m = manifestOf(['HIGH', 0, 1], ['LOW', -1, 0]);
    expect(m.declared.map((b) => b.name)).toEqual(['HIGH', 'LOW']);
    expect(m.bands.map((b) => b.name)).toEqual(['LOW', 'HIGH']);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_MANIFEST)).toBe(true);
    expect(Object.isFrozen(DEFAULT_MANIFEST.bands)).toBe(true);
  });
});

// ── pickBand ──────────────────────────────────────────────────────────────────
describe('pickBand', () => {
  const cases: [number, string][] = [
    [-1.0,  'CRITICAL'],
    [-0.9,  'CRITICAL'],
    [-0.8,  'CRITICAL'],
    [-0.79, 'AMBER'],
    [-0.3,  'AMBER'],
    [0.0,   'A0'],
    [0.7,   'A0'],
    [0.71,  'A++'],
    [1.0,   'A++'],
    [-1.5,  UNBANDED],
    [1.2,   UNBANDED],
  ];

  it.each(cases)('score %f → %s', (score, expected) => {
    expect(pickBand(DEFAULT_MANIFEST, score)).toBe(expected);
  });

  it('lookup follows upper-bound order, not declaration order', () => {
    const m = manifestOf(['HIGH', 0, 1], ['LOW', -1, 0]);
    expect(pickBand(m, 0)).toBe('LOW');
    expect(pickBand(m, -1)).toBe('LOW');
    expect(pickBand(m, 0.5)).toBe('HIGH');
  });

  it('falls through gaps to UNBANDED', () => {
    const m = manifestOf(['LOW', -1, 0], ['HIGH', 0.2, 1]);
    expect(pickBand(m, 0.1)).toBe(UNBANDED);
  });
});

describe('bandContains', () => {
  it('open lower bound for ordinary bands', () => {
    const band = { name: 'B', lower: 0, upper: 0.5, includesLower: false };
    expect(bandContains(band, 0)).toBe(false);
    expect(bandContains(band, 0.5)).toBe(true);
  });

  it('closed lower bound for the lowest band', () => {
    const band = { name: 'B', lower: 0, upper: 0.5, includesLower: true };
    expect(bandContains(band, 0)).toBe(true);
  });
});

// ── validateManifest ──────────────────────────────────────────────────────────
describe('validateManifest', () => {
  it('default manifest passes without diagnostics', () => {
    const result = validateManifest(DEFAULT_MANIFEST);
    expect(result.ok).toBe(true);
    expect(result.messages).toEqual([]);
  });

  it('overlapping bands fail with a message naming both', () => {
    const result = validateManifest(manifestOf(['LOW', -1, 0.5], ['HIGH', 0.2, 1]));
    expect(result.ok).toBe(false);
    expect(result.messages).toEqual(["Overlap between 'LOW' ending at 0.5 and 'HIGH' starting at 0.2"]);
  });

  it('bands outside [-1, 1] fail', () => {
    const result = validateManifest(manifestOf(['X', -1.2, 0], ['Y', 0, 1]));
    expect(result.ok).toBe(false);
    expect(result.messages).toContain("Band 'X' out of range or invalid interval: [-1.2, 0]");
  });

  it('non-increasing intervals fail', () => {
    const result = validateManifest(manifestOf(['LOW', -1, 0.5], ['FLAT', 0.5, 0.5], ['HIGH', 0.5, 1]));
    expect(result.ok).toBe(false);
    expect(result.messages).toContain("Band 'FLAT' out of range or invalid interval: [0.5, 0.5]");
  });

  it('an empty band set fails', () => {
    const result = validateManifest(manifestOf());
    expect(result.ok).toBe(false);
    expect(result.messages).toEqual(['Manifest declares no bands']);
  });

  it('gaps are warnings only', () => {
    const result = validateManifest(manifestOf(['LOW', -1, 0], ['HIGH', 0.2, 1]));
    expect(result.ok).toBe(true);
    expect(result.diagnostics).toEqual([
      { severity: 'warning', message: "Gap between 'LOW' hi=0 and 'HIGH' lo=0.2" },
    ]);
  });

  it('out-of-order declaration is a warning only', () => {
    const result = validateManifest(manifestOf(['HIGH', 0, 1], ['LOW', -1, 0]));
    expect(result.ok).toBe(true);
    expect(result.messages).toEqual([
      "Bands not declared in ascending 'align_max' order; lookup uses ascending order.",
    ]);
  });

  it('partial coverage warns at both edges', () => {
    const result = validateManifest(manifestOf(['MID', -0.5, 0.5]));
    expect(result.ok).toBe(true);
    expect(result.messages).toEqual([
      'Coverage begins at -0.5 (> -1). Consider extending to -1.',
      'Coverage ends at 0.5 (< 1). Consider extending to +1.',
    ]);
  });

  it('unusual epsilons warn', () => {
    const m = createManifest({
      manifestId: 'EPS',
      bands: [['ALL', -1, 1]],
      epsA: 0.05,
      epsW: 0.001,
    });
    const result = validateManifest(m);
    expect(result.ok).toBe(true);
    expect(result.messages).toEqual([
      'eps_a unusual: 0.05 (expected within (0, 0.01))',
      'eps_w unusual: 0.001 (expected within (0, 0.000001))',
    ]);
  });
});

// ── loadManifest ──────────────────────────────────────────────────────────────
describe('loadManifest', () => {
  it('reads band objects and layered epsilons (nested > top-level > default)', () => {
    const m = loadManifest({
      manifest_id: 'GRID_v2',
      eps_a: 1e-4,
      eps_w: 1e-9,
      align_computation: { eps_a: 1e-5 },
      bands: [
        { name: 'DOWN', align_min: -1, align_max: 0 },
        { name: 'UP', align_min: 0, align_max: 1, action: 'none' },
      ],
    });
    expect(m.manifestId).toBe('GRID_v2');
    expect(m.epsA).toBe(1e-5);
    expect(m.epsW).toBe(1e-9);
    expect(m.declared.map((b) => [b.name, b.lower, b.upper])).toEqual([
      ['DOWN', -1, 0],
      ['UP', 0, 1],
    ]);
  });

  it('falls back to built-in defaults for everything omitted', () => {
    const m = loadManifest({});
    expect(m.manifestId).toBe('PLANT_A_BEARING_SAFETY_v7');
    expect(m.epsA).toBe(1e-6);
    expect(m.epsW).toBe(1e-12);
    expect(m.declared.map((b) => b.name)).toEqual(['CRITICAL', 'AMBER', 'A0', 'A++']);
  });

  it('accepts triples under bands or bands_tuple', () => {
    expect(loadManifest({ bands: [['ONLY', -1, 1]] }).declared.map((b) => b.name)).toEqual(['ONLY']);
    expect(
      loadManifest({ bands: [], bands_tuple: [['T', -1, 1]] }).declared.map((b) => b.name),
    ).toEqual(['T']);
  });

  it('parses inline JSON', () => {
    const m = loadManifest('{"manifest_id":"INLINE","bands_tuple":[["ALL",-1,1]]}');
    expect(m.manifestId).toBe('INLINE');
    expect(m.bands.map((b) => b.name)).toEqual(['ALL']);
  });

  it('reads a manifest file when the string names one', () => {
    const dir = mkdtempSync(join(tmpdir(), 'bandstamp-manifest-'));
    const path = join(dir, 'manifest.json');
    writeFileSync(path, JSON.stringify({ manifest_id: 'FILE_v1' }), 'utf-8');
    expect(loadManifest(path).manifestId).toBe('FILE_v1');
  });

  it('rejects malformed JSON', () => {
    expect(() => loadManifest('{not json')).toThrow(ManifestLoadError);
    expect(() => loadManifest('{not json')).toThrow(/^Invalid JSON in inline manifest/);
  });

  it('rejects documents that do not match the schema', () => {
    let error: unknown;
    try {
      loadManifest({ bands: [{ name: 'X', align_min: 'low', align_max: 1 }] });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ManifestLoadError);
    expect(error instanceof ManifestLoadError && error.issues.length).toBeGreaterThan(0);
  });

  it('rejects eps_a that would empty the clamp window', () => {
    expect(() => loadManifest({ eps_a: 2 })).toThrow(ManifestLoadError);
  });

  it('rejects eps_a too small to keep clamped values off ±1', () => {
    expect(() => loadManifest({ eps_a: 1e-17 })).toThrow(/^Manifest does not match schema: eps_a:/);
    expect(() => loadManifest({ align_computation: { eps_a: 1e-13 } })).toThrow(
      /^Manifest does not match schema: align_computation\.eps_a:/,
    );
    expect(loadManifest({ eps_a: 1e-12 }).epsA).toBe(1e-12);
  });
});

// ── Manifest sources ──────────────────────────────────────────────────────────
describe('resolveManifest', () => {
  it('uses the built-in manifest when nothing is configured', () => {
    expect(resolveManifest(undefined, {})).toBe(DEFAULT_MANIFEST);
    expect(resolveManifest('', { BANDSTAMP_MANIFEST: '' })).toBe(DEFAULT_MANIFEST);
  });

  it('falls back to BANDSTAMP_MANIFEST', () => {
    expect(resolveManifest(undefined, { BANDSTAMP_MANIFEST: '{"manifest_id":"FROM_ENV"}' }).manifestId).toBe('FROM_ENV');
  });

  it('prefers an explicit source over the environment', () => {
    const env = { BANDSTAMP_MANIFEST: '{"manifest_id":"FROM_ENV"}' };
    expect(resolveManifest('{"manifest_id":"FROM_FLAG"}', env).manifestId).toBe('FROM_FLAG');
  });
});

describe('manifestFromSources', () => {
  it('is undefined when neither source is set', () => {
    expect(manifestFromSources(undefined)).toBeUndefined();
    expect(manifestFromSources(undefined, { OTHER: 'x' })).toBeUndefined();
  });

  it('loads from the environment', () => {
    expect(manifestFromSources(undefined, { BANDSTAMP_MANIFEST: '{"manifest_id":"E"}' })?.manifestId).toBe('E');
  });
});

// ── Manifest views ────────────────────────────────────────────────────────────
describe('effectiveManifest', () => {
  it('loads back into an equivalent manifest', () => {
    const source = manifestOf(['HIGH', 0, 1], ['LOW', -1, 0]);
    const reloaded = loadManifest(effectiveManifest(source));
    expect(reloaded).toEqual(source);
  });

  it('serializes bands as tuples', () => {
    expect(effectiveManifest(DEFAULT_MANIFEST)).toEqual({
      manifest_id: 'PLANT_A_BEARING_SAFETY_v7',
      eps_a: 1e-6,
      eps_w: 1e-12,
      bands_tuple: [
        ['CRITICAL', -1, -0.8],
        ['AMBER', -0.8, -0.3],
        ['A0', -0.3, 0.7],
        ['A++', 0.7, 1],
      ],
    });
  });
});

describe('manifestTemplate', () => {
  it('loads into a manifest that validates cleanly', () => {
    const m = loadManifest(manifestTemplate());
    expect(m.declared.map((b) => b.name)).toEqual(['CRITICAL', 'AMBER', 'A0', 'A++']);
    expect(validateManifest(m).messages).toEqual([]);
  });
});

describe('formatBandCard', () => {
  it('renders the lowest band closed and the rest half-open', () => {
    expect(formatBandCard(DEFAULT_MANIFEST).split('\n')).toEqual([
      'Band Card — effective manifest',
      'manifest_id: PLANT_A_BEARING_SAFETY_v7',
      'eps_a: 0.000001, eps_w: 1e-12',
      '- CRITICAL: [-1, -0.8]',
      '- AMBER: (-0.8, -0.3]',
      '- A0: (-0.3, 0.7]',
      '- A++: (0.7, 1]',
    ]);
  });
});
