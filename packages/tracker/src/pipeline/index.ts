export { Tracked, track, pipeAll } from './tracked.js';
export type { Attachment } from './tracked.js';
export { startLog, dumpLog, stopLog, getLog } from './lifecycle.js';
export type { StartLogOptions, DumpLogOptions } from './lifecycle.js';
export { describeFunction, describeCall } from './expression.js';
