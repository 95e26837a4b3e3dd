import { EXAMPLES } from '../constants.js';
import type { AlignRecord, JsonObject } from '../types/index.js';
import { clamp } from './fusion.js';
import type { AlignEngine } from './align-engine.js';

export interface ExampleOptions {
  count?: number;
  /** Seed for reproducible jitter; Math.random when omitted. */
  seed?: number;
}

interface ExampleTemplate {
  align: number;
  value: JsonObject;
}

// One template per domain; cycled when more examples are requested
const POOL: readonly ExampleTemplate[] = [
  { align: -0.60, value: { temperature_K: 279.9, a_phase: -0.62 } },
  { align: -0.50, value: { V_rms: 253.7, pf: 0.81, stress_score: 0.72 } },
  { align: -0.10, value: { cash_collected_usd: 18420.77 } },
  { align:  0.40, value: { model_score: 0.912, uncertainty: 0.18 } },
  { align:  0.75, value: { spo2: 0.95, hr_bpm: 78 } },
  { align: -0.88, value: { strain_micro: 220.5, temp_K: 315.3 } },
  { align:  0.60, value: { throughput_mbps: 512, error_rate: 0.0012 } },
  { align: -0.92, value: { power_kw: 42.3, temp_K: 330.2 } },
  { align: -0.15, value: { co2_ppm: 980, voc_index: 0.22 } },
  { align: -0.45, value: { wind_speed_ms: 18.4, gust_ms: 26.9 } },
];

/** Small deterministic PRNG returning floats in [0, 1). */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Chained example records. Each template's align is jittered by ±0.03 over
 * three observations, then fused and classified like any other input.
 */
export function generateExamples(engine: AlignEngine, options: ExampleOptions = {}): AlignRecord[] {
  const count = options.count ?? EXAMPLES.DEFAULT_COUNT;
  const random = options.seed === undefined ? Math.random : mulberry32(options.seed);
  const chain = engine.chain();
  const records: AlignRecord[] = [];

  for (let i = 0; i < count; i++) {
    const template = POOL[i % POOL.length];
    if (!template) break;
    const series = Array.from({ length: EXAMPLES.OBSERVATIONS }, () =>
      clamp(
        template.align + (random() * 2 - 1) * EXAMPLES.JITTER,
        -EXAMPLES.RAW_LIMIT,
        EXAMPLES.RAW_LIMIT,
      ),
    );
    records.push(chain.append({ value: template.value, series }).record);
  }

  return records;
}

/** Three chained records across three domains. */
export function demoRecords(engine: AlignEngine): AlignRecord[] {
  const chain = engine.chain();
  return [
    chain.append({ value: { temperature_K: 279.92, a_phase: -0.62 }, series: [-0.60, -0.64, -0.62] }),
    chain.append({
      value: { refund_amount_usd: 184.5, model_score: 0.912, stress_score: 0.35 },
      series: [0.10, 0.05, 0.20],
    }),
    chain.append({ value: { V_rms: 253.7, pf: 0.81, stress_score: 0.72 }, series: [-0.55, -0.68, -0.75] }),
  ].map((link) => link.record);
}
