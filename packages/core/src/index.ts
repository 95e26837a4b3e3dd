// @bandstamp/core — public API

// ── Engine ───────────────────────────────────────────────────────────────────
export { AlignEngine } from './engine/index.js';
export {
  clamp,
  convertLines,
  demoRecords,
  fuseAlign,
  generateExamples,
  mulberry32,
  selfCheck,
} from './engine/index.js';
export type { CheckResult, ExampleOptions, FuseOptions } from './engine/index.js';

// ── Manifest ─────────────────────────────────────────────────────────────────
export {
  DEFAULT_MANIFEST,
  bandContains,
  bandTuples,
  createManifest,
  effectiveManifest,
  formatBandCard,
  loadManifest,
  manifestFromDocument,
  manifestFromSources,
  manifestTemplate,
  pickBand,
  resolveManifest,
  validateManifest,
} from './manifest/index.js';
export type { BandTuple, ManifestEnv, ManifestInit, ManifestSource } from './manifest/index.js';

// ── Stamps ───────────────────────────────────────────────────────────────────
export {
  STAMP_PATTERN,
  canonicalJson,
  isoSeconds,
  makeStamp,
  parseStamp,
  prevReference,
  sha256Hex,
  stampDigest,
  thetaFromTime,
} from './stamp/index.js';
export type { StampOptions } from './stamp/index.js';

// ── Records ──────────────────────────────────────────────────────────────────
export {
  RecordChain,
  buildRecord,
  isJsonObject,
  parseInputLine,
  parseRecordLine,
  recordCore,
  verifyChain,
  verifyRecord,
} from './record/index.js';
export type { BuildOptions, RecordBuilderFn, VerifyOptions } from './record/index.js';

// ── Schemas, errors, constants ───────────────────────────────────────────────
export { AlignInputLineZ, AlignRecordZ, JsonObjectZ, ManifestDocumentZ } from './schema.js';
export { AlignInputError, ManifestLoadError, formatIssues } from './errors.js';
export { COVERAGE, EPS, EXAMPLES, MANIFEST_ENV, RECOMMENDED_EPS, STAMP, UNBANDED } from './constants.js';

// ── Types ────────────────────────────────────────────────────────────────────
export type {
  AlignInput,
  AlignRecord,
  Band,
  BandstampConfig,
  ChainLink,
  ChainReport,
  Clock,
  JsonObject,
  JsonValue,
  Manifest,
  ManifestDiagnostic,
  RecordCore,
  RecordIssue,
  Severity,
  StampParts,
  ValidationResult,
} from './types/index.js';
