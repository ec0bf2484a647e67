export * from './types';
export { create } from './client';
export type { Instance } from './client';
