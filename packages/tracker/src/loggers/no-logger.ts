import type { ChangeLogger } from '../interfaces/index.js';

/**
 * Logger that records nothing. Lets a pipeline keep its startLog/dumpLog
 * calls while logging is switched off.
 */
export class NoLogger implements ChangeLogger {
  record(): void {}

  flush(): void {}
}
