import type { ParseOptions } from '@knit/format';
import { createLogger, type Logger } from '@knit/logger';
import { loadConfig, type KnitConfig } from './config.js';

export interface CliContext {
  config: KnitConfig;
  logger: Logger;
}

/**
 * Load configuration and build the logger shared by every command
 */
export function createContext(cwd: string = process.cwd()): CliContext {
  const config = loadConfig(cwd);
  const logger = createLogger({
    environment: config.environment,
    minLevel: config.logLevel,
  });
  return { config, logger };
}

export function parseOptionsFor(context: CliContext, filePath: string): ParseOptions {
  return {
    logger: context.logger.child({ file: filePath }),
    limits: context.config.maxDepth === undefined ? {} : { maxDepth: context.config.maxDepth },
  };
}
