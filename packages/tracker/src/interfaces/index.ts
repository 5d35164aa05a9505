export type { ChangeLogger, StepMeta, FlushRequest } from './change-logger.js';
