import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { NoopLogger } from './noopLogger';
export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, NoopLogger };
