export { create as createProcessedSet, StateError } from './processed-set';
export type { Instance as ProcessedSet, ProcessedEntries, ProcessedSetConfig } from './processed-set';
