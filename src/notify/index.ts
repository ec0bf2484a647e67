export * from './types';
export * as Messages from './messages';
export { create as createSlack } from './slack';
export type { SlackConfig } from './slack';
