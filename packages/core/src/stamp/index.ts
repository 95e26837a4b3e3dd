export { canonicalJson, sha256Hex } from './canonical.js';
export {
  STAMP_PATTERN,
  isoSeconds,
  makeStamp,
  parseStamp,
  prevReference,
  stampDigest,
  thetaFromTime,
} from './stamper.js';
export type { StampOptions } from './stamper.js';
