// Core types — bands, manifests, records and chain links

// ─── JSON payloads ────────────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ─── Bands ────────────────────────────────────────────────────────────────────

export interface Band {
  name: string;
  lower: number;
  upper: number;
  /**
   * Closed at the lower bound. Only the globally lowest band carries this, so
   * the extreme boundary (e.g. exactly -1) is classified.
   */
  includesLower: boolean;
}

// ─── Manifest ─────────────────────────────────────────────────────────────────

export interface Manifest {
  readonly manifestId: string;
  /** Bands as authored, in declaration order. */
  readonly declared: readonly Band[];
  /** Same bands sorted ascending by upper bound; used for lookup. */
  readonly bands: readonly Band[];
  readonly epsA: number;
  readonly epsW: number;
}

export type Severity = 'error' | 'warning';

export interface ManifestDiagnostic {
  severity: Severity;
  message: string;
}

export interface ValidationResult {
  ok: boolean;
  messages: string[];
  diagnostics: ManifestDiagnostic[];
}

// ─── Records ──────────────────────────────────────────────────────────────────

/** Pre-stamp content — exactly the fields the stamp digest covers. */
export type RecordCore = {
  value: JsonObject;
  align: number;
  band: string;
  manifest_id: string;
};

export type AlignRecord = RecordCore & {
  stamp: string;
};

export interface AlignInput {
  value: JsonObject;
  series: number[];
  weights?: number[];
  /** Digest of the predecessor's stamp, if this record continues a chain. */
  prev?: string;
}

/** A built record plus the digest the next record in the chain must reference. */
export interface ChainLink {
  record: Readonly<AlignRecord>;
  digest: string;
}

export interface StampParts {
  protocol: string;
  timestamp: string;
  theta: number;
  digest: string;
  prev: string | null;
}

// ─── Verification ─────────────────────────────────────────────────────────────

export interface RecordIssue {
  index: number;
  message: string;
}

export interface ChainReport {
  ok: boolean;
  checked: number;
  issues: RecordIssue[];
}

// ─── Engine Config ────────────────────────────────────────────────────────────

export type Clock = () => Date;

export interface BandstampConfig {
  manifest?: Manifest;
  clock?: Clock;
  /** Emit a console warning when a record lands outside every band (default: true) */
  warnOnUnbanded?: boolean;
}
