// Record stamper — time-bound, content-addressed, chained audit strings
//
//   SSMCLOCK1|<UTC second>Z|theta=<deg>|sha256=<content digest>|prev=<digest|NONE>
//
// theta is the time of day as a clock angle (0–360°). It is a freshness hint
// for human auditors, not a security primitive; timestamps are wall-clock and
// not monotonic across restarts.

import { STAMP } from '../constants.js';
import type { JsonValue, StampParts } from '../types/index.js';
import { canonicalJson, sha256Hex } from './canonical.js';

export const STAMP_PATTERN =
  /^SSMCLOCK1\|(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z)\|theta=(\d+\.\d{2})\|sha256=([0-9a-f]{64})\|prev=([0-9a-f]{64}|NONE)$/;

// Anything that cannot break the pipe-delimited grammar
const PREV_PATTERN = /^[0-9a-f]{64}$/;

export interface StampOptions {
  /** Digest of the predecessor's stamp. */
  prev?: string | null;
  /** Wall-clock instant to stamp (default: now). */
  now?: Date;
}

/**
 * Clock angle of the UTC time of day, rounded to 2 decimals with ties to even.
 * theta = sod/240 sits exactly on a half-hundredth only when sod % 60 === 30.
 */
export function thetaFromTime(ts: Date): number {
  const sod = (ts.getUTCHours() * 3600 + ts.getUTCMinutes() * 60 + ts.getUTCSeconds()) % STAMP.SECONDS_PER_DAY;
  const theta = (sod * 360) / STAMP.SECONDS_PER_DAY;
  if (sod % 60 === 30) {
    const lower = Math.floor(theta * 100);
    return (lower % 2 === 0 ? lower : lower + 1) / 100;
  }
  return Number(theta.toFixed(2));
}

/** ISO-8601 UTC truncated to whole seconds, e.g. 2026-01-05T08:30:00Z */
export function isoSeconds(ts: Date): string {
  const whole = new Date(Math.floor(ts.getTime() / 1000) * 1000);
  return whole.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** Normalize a predecessor reference to the value written in `prev=`; only a sha256 hex digest is kept. */
export function prevReference(prev: string | null | undefined): string {
  return typeof prev === 'string' && PREV_PATTERN.test(prev) ? prev : STAMP.NO_PREV;
}

export function makeStamp(content: JsonValue, options: StampOptions = {}): string {
  const ts = options.now ?? new Date();
  const digest = sha256Hex(canonicalJson(content));
  return [
    STAMP.PROTOCOL,
    isoSeconds(ts),
    `theta=${thetaFromTime(ts).toFixed(2)}`,
    `sha256=${digest}`,
    `prev=${prevReference(options.prev)}`,
  ].join('|');
}

/** The chain reference for a stamp: sha256 of the stamp string itself. */
export function stampDigest(stamp: string): string {
  return sha256Hex(stamp);
}

/** Split a stamp into its fields, or null when it does not match the grammar. */
export function parseStamp(stamp: string): StampParts | null {
  const m = STAMP_PATTERN.exec(stamp);
  if (!m) return null;
  const [, timestamp = '', theta = '', digest = '', prev = ''] = m;
  return {
    protocol: STAMP.PROTOCOL,
    timestamp,
    theta: Number(theta),
    digest,
    prev: prev === STAMP.NO_PREV ? null : prev,
  };
}
