import { DEFAULT_MANIFEST, pickBand } from '../manifest/bands.js';
import { fuseAlign } from '../engine/fusion.js';
import { AlignInputError } from '../errors.js';
import { makeStamp, stampDigest } from '../stamp/stamper.js';
import type {
  AlignInput,
  AlignRecord,
  ChainLink,
  JsonObject,
  JsonValue,
  Manifest,
  RecordCore,
} from '../types/index.js';

export interface BuildOptions {
  /** Instant written into the stamp (default: now). */
  now?: Date;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T extends JsonValue>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Fuse → classify → stamp. Returns the frozen record together with the digest
 * of its stamp, which the caller threads into the next build as `prev`.
 */
export function buildRecord(
  input: AlignInput,
  manifest: Manifest = DEFAULT_MANIFEST,
  options: BuildOptions = {},
): ChainLink {
  if (!isJsonObject(input.value)) {
    throw new AlignInputError('value must be a JSON object');
  }

  const align = fuseAlign(input.series, {
    weights: input.weights,
    epsA: manifest.epsA,
    epsW: manifest.epsW,
  });

  const core: RecordCore = {
    value: deepFreeze(structuredClone(input.value)),
    align,
    band: pickBand(manifest, align),
    manifest_id: manifest.manifestId,
  };
  const stamp = makeStamp(core, { prev: input.prev, now: options.now });
  const record: AlignRecord = Object.freeze({ ...core, stamp });

  return { record, digest: stampDigest(stamp) };
}

/** The fields a record's content digest covers, in a fresh object. */
export function recordCore(record: AlignRecord): RecordCore {
  return {
    value: record.value,
    align: record.align,
    band: record.band,
    manifest_id: record.manifest_id,
  };
}
