import type { Logger } from '../logger/index.js';

/**
 * What every detection strategy needs besides its own paths
 */
export interface DetectionContext {
  logger: Logger;
  /** Milliseconds per external command; 0 waits indefinitely */
  commandTimeout: number;
}
