export { CrawlCoordinator } from './coordinator.js';
export type { CoordinatorOptions, CoordinatorEvents } from './coordinator.js';
export { CrawlWorker } from './worker.js';
export type { WorkerContext, WorkerEvents } from './worker.js';
export { Frontier } from './frontier.js';
export type { FrontierEntry, FrontierOptions, FrontierCloseReason } from './frontier.js';
export { OutcomeRecorder } from './outcome.js';
export {
  normalizeUrl,
  globToRegex,
  UrlScope,
  createUrlKeyer,
  DEFAULT_IGNORED_EXTENSIONS,
} from './base.js';
export type { UrlScopeOptions } from './base.js';
