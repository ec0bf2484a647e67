export * from './types';
export { create, bundleId, fillTemplate, findLatestBundle, withHeadline } from './manager';
export type { ManagerInstance } from './manager';
