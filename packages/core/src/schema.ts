// Wire schemas — manifest documents, per-record input lines, emitted records

import { z } from 'zod';
import { EPS } from './constants.js';
import type { JsonValue } from './types/index.js';

export const JsonValueZ: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueZ),
    z.record(JsonValueZ),
  ]),
);

/** Record payloads must be JSON objects, never arrays or scalars. */
export const JsonObjectZ = z.record(JsonValueZ);

const BoundZ = z.number().finite();

// ─── Manifest document ────────────────────────────────────────────────────────

export const BandObjectZ = z
  .object({
    name: z.string().min(1),
    align_min: BoundZ,
    align_max: BoundZ,
  })
  .passthrough(); // action / window annotations ride along untouched

export const BandTupleZ = z.tuple([z.string().min(1), BoundZ, BoundZ]);

export const BandListZ = z.union([z.array(BandObjectZ), z.array(BandTupleZ)]);

// eps_a must keep clamped values representably inside (-1, 1); magnitude advice lives in validateManifest
const EpsAZ = z.number().gte(EPS.A_MIN).lt(1);
const EpsWZ = z.number().gt(0).finite();

export const AlignComputationZ = z
  .object({
    eps_a: EpsAZ.optional(),
    eps_w: EpsWZ.optional(),
  })
  .passthrough();

export const ManifestDocumentZ = z
  .object({
    manifest_id: z.string().min(1).optional(),
    eps_a: EpsAZ.optional(),
    eps_w: EpsWZ.optional(),
    align_computation: AlignComputationZ.optional(),
    bands: BandListZ.optional(),
    bands_tuple: z.array(BandTupleZ).optional(),
  })
  .passthrough();

export type ManifestDocument = z.infer<typeof ManifestDocumentZ>;

// ─── Records ──────────────────────────────────────────────────────────────────

export const AlignInputLineZ = z.object({
  value: JsonObjectZ,
  a_raw: z.array(z.number().finite()).min(1),
  weights: z.array(z.number().finite().nonnegative()).optional(),
  prev: z.string().nullable().optional(),
});

export type AlignInputLine = z.infer<typeof AlignInputLineZ>;

export const AlignRecordZ = z.object({
  value: JsonObjectZ,
  align: z.number(),
  band: z.string(),
  manifest_id: z.string(),
  stamp: z.string(),
});
