// Self-check harness — invariants a deployment can assert at startup or in CI

import { DEFAULT_MANIFEST } from '../manifest/bands.js';
import { validateManifest } from '../manifest/validate.js';
import { STAMP_PATTERN, parseStamp } from '../stamp/stamper.js';
import type { Manifest } from '../types/index.js';
import { AlignEngine } from './align-engine.js';
import { fuseAlign } from './fusion.js';

export interface CheckResult {
  name: string;
  ok: boolean;
}

const BOUNDEDNESS_SERIES: readonly number[][] = [
  [0.0],
  [0.2, -0.1, 0.05],
  [0.99, 0.99, 0.99],
  [-0.99, -0.98, -0.97],
  [0.9, -0.9, 0.9, -0.9],
  [5, -12, 1, 1],
];

const ORDER_SERIES = [0.7, -0.2, 0.1, 0.6, -0.5, 0.3];

export function selfCheck(manifest: Manifest = DEFAULT_MANIFEST): CheckResult[] {
  const engine = new AlignEngine({ manifest, warnOnUnbanded: false });
  const opts = { epsA: manifest.epsA, epsW: manifest.epsW };

  const bounded = BOUNDEDNESS_SERIES.every((s) => {
    const a = fuseAlign(s, opts);
    return a > -1 && a < 1;
  });

  const forward = fuseAlign(ORDER_SERIES, opts);
  const reversed = fuseAlign([...ORDER_SERIES].reverse(), opts);

  const banding = manifest.bands.every((band) => {
    const mid = (band.lower + band.upper) / 2;
    return engine.build({ value: { x: 1 }, series: [mid, mid, mid] }).record.band === band.name;
  });

  const single = engine.build({ value: { foo: 42 }, series: [0.15, 0.05, 0.1] }).record;

  const chain = engine.chain();
  const first = chain.append({ value: { x: 1 }, series: [0.1, 0.1, 0.1] });
  const second = chain.append({ value: { x: 2 }, series: [0.2, 0.2, 0.2] });

  return [
    { name: 'boundedness(-1,+1)', ok: bounded },
    { name: 'order_invariance(batch==reversed)', ok: Math.abs(forward - reversed) < 1e-12 },
    { name: 'band_mapping(manifest cutpoints)', ok: banding },
    {
      name: 'manifest_id+stamp_format',
      ok: single.manifest_id.length >= 3 && STAMP_PATTERN.test(single.stamp),
    },
    {
      name: 'stamp_chain(prev=hash(prev_stamp))',
      ok: STAMP_PATTERN.test(first.record.stamp) && parseStamp(second.record.stamp)?.prev === first.digest,
    },
    { name: 'manifest_validate', ok: validateManifest(manifest).ok },
  ];
}
