// RecordChain — caller-owned chain state for a serialized record producer.
//
// Each append stamps the new record with the digest of the previous stamp and
// advances the head. Nothing is shared between chains; producers that need
// one chain across workers must serialize their appends.

import type { AlignInput, ChainLink } from '../types/index.js';

export type RecordBuilderFn = (input: AlignInput) => ChainLink;

export class RecordChain {
  private current: string | undefined;
  private count = 0;

  constructor(
    private readonly build: RecordBuilderFn,
    head?: string,
  ) {
    this.current = head;
  }

  /**
   * Build the next record. An explicit `input.prev` takes precedence over the
   * running head (e.g. a batch line that declares its own predecessor).
   */
  append(input: AlignInput): ChainLink {
    const prev = input.prev !== undefined && input.prev !== '' ? input.prev : this.current;
    const link = this.build({ ...input, prev });
    this.current = link.digest;
    this.count++;
    return link;
  }

  /** Digest the next appended record will reference, if any. */
  get head(): string | undefined {
    return this.current;
  }

  get length(): number {
    return this.count;
  }
}
