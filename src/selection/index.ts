export * from './types';
export { create } from './machine';
export type { Instance } from './machine';
export { parseSelectionInput } from './input';
export { toTitleCase } from './title-case';
export { create as createCliPrompter } from './cli-prompter';
export type { Ask, CliPrompterOptions } from './cli-prompter';
export { create as createChannelPrompter } from './channel-prompter';
export type { ChannelPrompterConfig } from './channel-prompter';
