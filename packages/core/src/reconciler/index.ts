export { inspectModelDirectory, removeModelFiles, scanModel } from './scan.js';
export type { DiskScan, DiskState } from './scan.js';
