/**
 * Shared command setup: configuration and logger
 */

import { createConfigManager, type HitListConfig } from '../../lib/env-config.js';
import { Logger } from '../../lib/logger.js';
import { type Result, ok, err } from '../../lib/result-types.js';
import type { ConfigurationError } from '../../lib/errors/HitListErrors.js';
import type { TopHitsOptions } from '../../services/top-hits.js';

export interface CommandRuntime {
  config: HitListConfig;
  logger: Logger;
  listOptions: TopHitsOptions;
}

export interface RuntimeOptions {
  /** Command prints JSON on stdout, so log entries go to stderr */
  json?: boolean;
}

/**
 * Load .env and the environment into a runtime for one command
 */
export function createRuntime(options: RuntimeOptions = {}): Result<CommandRuntime, ConfigurationError> {
  const manager = createConfigManager();
  const loaded = manager.loadEnv();
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  const config = manager.getHitListConfig();
  if (config.isErr()) {
    return err(config.error);
  }

  const logger = new Logger({
    logDir: config.value.logDir ?? undefined,
    consoleLevel: config.value.logLevel,
    stderrOnly: options.json === true,
  });

  return ok({
    config: config.value,
    logger,
    listOptions: {
      initialCapacity: config.value.initialCapacity,
      maxCapacity: config.value.maxCapacity,
      logger,
    },
  });
}

/**
 * Parse a numeric option, rejecting anything that is not a finite number
 */
export function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const num = Number(value);
  if (value.trim() === '' || !Number.isFinite(num)) {
    throw new Error(`Option ${name} expects a number, got "${value}"`);
  }
  return num;
}
