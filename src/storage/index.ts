/**
 * Storage Module
 */

export { CheckpointManager, checkpointSchema, articleRecordSchema } from './checkpoint.js';
export type { CheckpointFile, LoadedCheckpoint, CheckpointManagerOptions } from './checkpoint.js';
export { ProgressWriter } from './progress.js';
export type { ProgressFiles } from './progress.js';
export { toCsv } from './csv.js';
export { fileTimestamp, writeFileAtomic, writeNewFile, ensureDir } from './files.js';
