/**
 * Centralized constants for the Bandstamp align engine.
 * All magic numbers live here — change once, applies everywhere.
 */

// ── Numeric guards ────────────────────────────────────────────────────────────
export const EPS = {
  /** Clamp margin: raw values are held inside [-1+A, 1-A] before atanh */
  A:              1e-6,
  /** Smallest accepted clamp margin; below it tanh(atanh(1-A)) rounds to 1 */
  A_MIN:          1e-12,
  /** Floor for the accumulated weight sum */
  W:              1e-12,
} as const;

// ── Recommended epsilon windows (open intervals, upper bound only) ───────────
export const RECOMMENDED_EPS = {
  A_MAX:          1e-2,
  W_MAX:          1e-6,
} as const;

// ── Band coverage ─────────────────────────────────────────────────────────────
export const COVERAGE = {
  LOWER:          -1,
  UPPER:          1,
  /** Slack allowed before a coverage edge is reported */
  TOLERANCE:      1e-6,
} as const;

// ── Stamp format ──────────────────────────────────────────────────────────────
export const STAMP = {
  PROTOCOL:       'SSMCLOCK1',
  /** Written in the prev= field when no predecessor digest is supplied */
  NO_PREV:        'NONE',
  SECONDS_PER_DAY: 86_400,
} as const;

/** Environment variable entry points consult when no manifest source is given. */
export const MANIFEST_ENV = 'BANDSTAMP_MANIFEST';

/** Band label for a score that no configured band contains. */
export const UNBANDED = 'UNBANDED';

// ── Example generation ────────────────────────────────────────────────────────
export const EXAMPLES = {
  DEFAULT_COUNT:  10,
  OBSERVATIONS:   3,
  /** Half-width of the uniform jitter applied around each template's align */
  JITTER:         0.03,
  RAW_LIMIT:      0.999999,
} as const;
