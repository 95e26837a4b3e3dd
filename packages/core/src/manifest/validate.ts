import { COVERAGE, RECOMMENDED_EPS } from '../constants.js';
import type { Band, Manifest, ManifestDiagnostic, ValidationResult } from '../types/index.js';

/**
 * Check a manifest's band set and epsilons for internal consistency.
 *
 * Hard failures (`ok: false`): no bands, a band outside [-1, 1] or with a
 * non-increasing interval, overlapping bands.
 * Warnings: declaration order not ascending by upper bound, gaps between
 * adjacent bands, coverage short of [-1, 1], epsilons outside the recommended
 * windows.
 */
export function validateManifest(manifest: Manifest): ValidationResult {
  const diagnostics: ManifestDiagnostic[] = [];
  const fail = (message: string) => diagnostics.push({ severity: 'error', message });
  const warn = (message: string) => diagnostics.push({ severity: 'warning', message });

  const declared = manifest.declared;
  if (declared.length === 0) {
    fail('Manifest declares no bands');
  }

  for (const { name, lower, upper } of declared) {
    const inRange =
      Number.isFinite(lower) && Number.isFinite(upper) &&
      COVERAGE.LOWER <= lower && lower < upper && upper <= COVERAGE.UPPER;
    if (!inRange) {
      fail(`Band '${name}' out of range or invalid interval: [${lower}, ${upper}]`);
    }
  }

  const sorted = [...declared].sort((a, b) => a.upper - b.upper);
  if (sorted.some((band, i) => band !== declared[i])) {
    warn("Bands not declared in ascending 'align_max' order; lookup uses ascending order.");
  }

  let previous: Band | undefined;
  for (const band of sorted) {
    if (previous) {
      if (band.lower < previous.upper) {
        fail(
          `Overlap between '${previous.name}' ending at ${previous.upper} ` +
          `and '${band.name}' starting at ${band.lower}`,
        );
      } else if (band.lower > previous.upper) {
        warn(`Gap between '${previous.name}' hi=${previous.upper} and '${band.name}' lo=${band.lower}`);
      }
    }
    previous = band;
  }

  const last = sorted[sorted.length - 1];
  if (last) {
    const firstLower = Math.min(...sorted.map((b) => b.lower));
    if (firstLower > COVERAGE.LOWER + COVERAGE.TOLERANCE) {
      warn(`Coverage begins at ${firstLower} (> -1). Consider extending to -1.`);
    }
    if (last.upper < COVERAGE.UPPER - COVERAGE.TOLERANCE) {
      warn(`Coverage ends at ${last.upper} (< 1). Consider extending to +1.`);
    }
  }

  if (!(manifest.epsA > 0 && manifest.epsA < RECOMMENDED_EPS.A_MAX)) {
    warn(`eps_a unusual: ${manifest.epsA} (expected within (0, ${RECOMMENDED_EPS.A_MAX}))`);
  }
  if (!(manifest.epsW > 0 && manifest.epsW < RECOMMENDED_EPS.W_MAX)) {
    warn(`eps_w unusual: ${manifest.epsW} (expected within (0, ${RECOMMENDED_EPS.W_MAX}))`);
  }

  return {
    ok: diagnostics.every((d) => d.severity !== 'error'),
    messages: diagnostics.map((d) => d.message),
    diagnostics,
  };
}
