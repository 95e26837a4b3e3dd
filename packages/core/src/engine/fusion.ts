// Numeric fusion — clamp → atanh → weighted accumulate → tanh

import { EPS } from '../constants.js';
import { AlignInputError } from '../errors.js';

export interface FuseOptions {
  /** Per-observation weights, non-negative; must match the series length when given. */
  weights?: readonly number[];
  epsA?: number;
  epsW?: number;
}

export function clamp(x: number, lo: number, hi: number): number {
  return x < lo ? lo : x > hi ? hi : x;
}

/**
 * Fuse raw observations into a single align score.
 *
 *   a_c   := clamp(a, -1+epsA, 1-epsA)
 *   u     := atanh(a_c)
 *   U += w·u ; W += w
 *   align := tanh(U / max(W, epsW))
 *
 * With non-negative weights |U / max(W, epsW)| never exceeds the largest
 * |atanh(a_c)|, and epsA >= EPS.A_MIN keeps that below the point where tanh
 * rounds to ±1, so the result is strictly inside (-1, 1).
 */
export function fuseAlign(series: readonly number[], options: FuseOptions = {}): number {
  const { weights, epsA = EPS.A, epsW = EPS.W } = options;

  if (!(epsA >= EPS.A_MIN && epsA < 1)) {
    throw new AlignInputError(`eps_a must lie in [${EPS.A_MIN}, 1): got ${String(epsA)}`);
  }
  if (!(epsW > 0 && Number.isFinite(epsW))) {
    throw new AlignInputError(`eps_w must be a positive finite number: got ${String(epsW)}`);
  }
  if (series.length === 0) {
    throw new AlignInputError('empty series: at least one observation is required');
  }
  if (weights !== undefined && weights.length !== series.length) {
    throw new AlignInputError(
      `weights length (${weights.length}) must match series length (${series.length})`,
    );
  }

  const lo = -1 + epsA;
  const hi = 1 - epsA;
  let U = 0;
  let W = 0;

  series.forEach((a, i) => {
    const w = weights === undefined ? 1 : weights[i];
    if (!Number.isFinite(a)) {
      throw new AlignInputError(`observation ${i} is not a finite number: ${String(a)}`);
    }
    if (w === undefined || !Number.isFinite(w)) {
      throw new AlignInputError(`weight ${i} is not a finite number: ${String(w)}`);
    }
    if (w < 0) {
      throw new AlignInputError(`weight ${i} is negative: ${w}`);
    }
    U += w * Math.atanh(clamp(a, lo, hi));
    W += w;
  });

  return Math.tanh(U / Math.max(W, epsW));
}
