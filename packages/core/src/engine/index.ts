export { AlignEngine } from './align-engine.js';
export { clamp, fuseAlign } from './fusion.js';
export type { FuseOptions } from './fusion.js';
export { demoRecords, generateExamples, mulberry32 } from './examples.js';
export type { ExampleOptions } from './examples.js';
export { convertLines } from './convert.js';
export { selfCheck } from './self-check.js';
export type { CheckResult } from './self-check.js';
