import type { AppConfig, TrackerDb } from '@duetrack/core';
import type { Logger } from './lib/logger.js';

/** Everything a route needs, built once in createApp */
export interface AppContext {
  readonly config: AppConfig;
  readonly db: TrackerDb;
  readonly logger: Logger;
  /** Today's date as yyyy-MM-dd, read on every request */
  readonly today: () => string;
}
