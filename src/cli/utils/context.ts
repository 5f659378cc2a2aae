/**
 * Shared command setup: configuration, logger and the service graph
 */

import { loadConfig, type TasteStoreConfig } from '../../lib/env-config.js';
import { Logger } from '../../lib/logger.js';
import { describeError } from '../../lib/errors/TasteStoreErrors.js';
import { createTasteService } from '../../services/taste-service-factory.js';
import type { TasteService } from '../../services/taste-service.js';

export interface CliContext {
  config: TasteStoreConfig;
  logger: Logger;
}

/**
 * Load configuration from the environment and .env
 *
 * Throws with a printable message; commands report it and exit.
 */
export function loadCliContext(): CliContext {
  const config = loadConfig();
  if (config.isErr()) {
    throw new Error(describeError(config.error));
  }

  const logger = new Logger({
    logDir: config.value.logging.logDir,
    consoleLevel: config.value.logging.level,
  });

  return { config: config.value, logger };
}

/**
 * Run a command body against a ready TasteService, closing it afterwards
 */
export async function withTasteService<T>(fn: (service: TasteService, context: CliContext) => Promise<T>): Promise<T> {
  const context = loadCliContext();
  const service = await createTasteService(context.config, context.logger);
  if (service.isErr()) {
    throw new Error(describeError(service.error));
  }

  try {
    return await fn(service.value, context);
  } finally {
    await service.value.close();
  }
}
