import type { RunConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import type { PageFetcher } from '../http/pageFetcher.js';
import type { TableStore } from '../store/tableStore.js';

/** Collaborators shared by every phase of a run */
export interface RunContext {
  config: RunConfig;
  logger: Logger;
  fetcher: PageFetcher;
  store: TableStore;
}
