export * from './types';
export { create as createStore, PublishTriggerStateSchema } from './store';
export type { Instance as PollerStore, StatePatch } from './store';
export { create as createPoller } from './poller';
export type { Instance as Poller, PollerConfig, RunResult, TickResult } from './poller';
export { create as createSupervisor } from './supervisor';
export type { Instance as PollerSupervisor, SupervisorConfig } from './supervisor';
export { create as createPublisher, mediaFilename, readTitle } from './publisher';
export type { PublisherConfig } from './publisher';
export { markdownToHtml } from './markdown';
export { findVideo, titlesMatch } from './video';
export type { VideoInfo, VideoLookupConfig } from './video';
