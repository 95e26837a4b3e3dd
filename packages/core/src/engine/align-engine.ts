// AlignEngine — the embeddable fuse/classify/stamp facade
//
// Embedding example:
//   import { AlignEngine, loadManifest } from '@bandstamp/core';
//   const engine = new AlignEngine({ manifest: loadManifest('./manifest.json') });
//   const chain = engine.chain();
//   const { record } = chain.append({ value: { temp_K: 279.9 }, series: [-0.6, -0.64] });

import type {
  AlignInput,
  BandstampConfig,
  ChainLink,
  Clock,
  Manifest,
  ValidationResult,
} from '../types/index.js';
import { UNBANDED } from '../constants.js';
import { DEFAULT_MANIFEST, pickBand } from '../manifest/bands.js';
import { validateManifest } from '../manifest/validate.js';
import { buildRecord } from '../record/builder.js';
import { RecordChain } from '../record/chain.js';

export class AlignEngine {
  readonly manifest: Manifest;
  private readonly clock: Clock;
  private readonly warnOnUnbanded: boolean;

  constructor(config: BandstampConfig = {}) {
    this.manifest = config.manifest ?? DEFAULT_MANIFEST;
    this.clock = config.clock ?? (() => new Date());
    this.warnOnUnbanded = config.warnOnUnbanded ?? true;
  }

  /** Build one record. Chain state stays with the caller via `input.prev`. */
  build(input: AlignInput): ChainLink {
    const link = buildRecord(input, this.manifest, { now: this.clock() });

    // Unbanded is not an error, but downstream policy must be able to see it
    if (this.warnOnUnbanded && link.record.band === UNBANDED) {
      console.warn(
        `[bandstamp] align ${link.record.align} matched no band in manifest "${this.manifest.manifestId}"`,
      );
    }

    return link;
  }

  /** Start a new chain, optionally continuing from an existing stamp digest. */
  chain(head?: string): RecordChain {
    return new RecordChain((input) => this.build(input), head);
  }

  pickBand(score: number): string {
    return pickBand(this.manifest, score);
  }

  validate(): ValidationResult {
    return validateManifest(this.manifest);
  }
}
