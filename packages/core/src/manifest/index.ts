export {
  DEFAULT_MANIFEST,
  bandContains,
  bandTuples,
  createManifest,
  pickBand,
} from './bands.js';
export type { BandTuple, ManifestInit } from './bands.js';
export { loadManifest, manifestFromDocument, manifestFromSources, resolveManifest } from './load.js';
export type { ManifestEnv, ManifestSource } from './load.js';
export { validateManifest } from './validate.js';
export { effectiveManifest, formatBandCard, manifestTemplate } from './template.js';
