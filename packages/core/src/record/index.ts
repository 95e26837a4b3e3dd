export { buildRecord, isJsonObject, recordCore } from './builder.js';
export type { BuildOptions } from './builder.js';
export { RecordChain } from './chain.js';
export type { RecordBuilderFn } from './chain.js';
export { verifyChain, verifyRecord } from './verify.js';
export type { VerifyOptions } from './verify.js';
export { parseInputLine, parseRecordLine } from './lines.js';
