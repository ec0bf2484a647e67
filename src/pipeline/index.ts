export * from './types';
export { create } from './orchestrator';
export type { Instance } from './orchestrator';
