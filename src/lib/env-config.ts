/**
 * Configuration Management
 *
 * Hit-list configuration from environment variables and an optional .env file.
 */

import { config as loadEnv } from 'dotenv';
import { type Result, ok, err } from './result-types.js';
import { ConfigurationError } from './errors/HitListErrors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import {
	DEFAULT_HIT_CAPACITY,
	DEFAULT_MAX_HIT_CAPACITY,
	ENV_INITIAL_CAPACITY,
	ENV_LOG_DIR,
	ENV_LOG_LEVEL,
	ENV_MAX_CAPACITY,
} from '../constants/hitlist-constants.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Runtime configuration for hit lists and their logging
 */
export interface HitListConfig {
	/** Slot capacity of a freshly created list */
	initialCapacity: number;

	/** Largest capacity a list may grow to before allocation fails */
	maxCapacity: number;

	/** Directory for JSON Lines logs; null disables file logging */
	logDir: string | null;

	/** Minimum level written to the console */
	logLevel: LogLevel;
}

export const DEFAULT_HIT_LIST_CONFIG: HitListConfig = {
	initialCapacity: DEFAULT_HIT_CAPACITY,
	maxCapacity: DEFAULT_MAX_HIT_CAPACITY,
	logDir: null,
	logLevel: 'warn',
};

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Loads .env files and provides validated access to the hit-list settings.
 */
export class ConfigurationManager {
	constructor(
		private envPath?: string,
		private env: NodeJS.ProcessEnv = process.env
	) {}

	/**
	 * Load environment variables from .env file
	 *
	 * A missing file is not an error; the environment is used as it is.
	 * Values already set in the environment win over the file.
	 */
	loadEnv(): Result<void, ConfigurationError> {
		try {
			const result = loadEnv({ path: this.envPath, processEnv: {} });

			if (result.error && !isMissingFile(result.error)) {
				return err(
					new ConfigurationError(
						'envPath',
						this.envPath ?? '.env',
						`failed to load .env file: ${result.error.message}`
					)
				);
			}

			for (const [key, value] of Object.entries(result.parsed ?? {})) {
				if (this.env[key] === undefined) {
					this.env[key] = value;
				}
			}
			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigurationError(
					'envPath',
					this.envPath ?? '.env',
					`failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`
				)
			);
		}
	}

	/**
	 * Get the hit-list configuration
	 *
	 * @returns Result with configuration or the first invalid setting
	 */
	getHitListConfig(): Result<HitListConfig, ConfigurationError> {
		const initialCapacity = this.getEnvInteger(ENV_INITIAL_CAPACITY, DEFAULT_HIT_LIST_CONFIG.initialCapacity);
		if (initialCapacity.isErr()) {
			return err(initialCapacity.error);
		}

		const maxCapacity = this.getEnvInteger(ENV_MAX_CAPACITY, DEFAULT_HIT_LIST_CONFIG.maxCapacity);
		if (maxCapacity.isErr()) {
			return err(maxCapacity.error);
		}

		// lists never start below the default capacity
		const startCapacity = Math.max(DEFAULT_HIT_CAPACITY, initialCapacity.value);
		if (maxCapacity.value < startCapacity) {
			return err(
				new ConfigurationError(
					ENV_MAX_CAPACITY,
					maxCapacity.value,
					`must be at least the starting list capacity (${startCapacity})`
				)
			);
		}

		const logLevel = this.getEnvVar(ENV_LOG_LEVEL)?.toLowerCase() ?? DEFAULT_HIT_LIST_CONFIG.logLevel;
		if (!isLogLevel(logLevel)) {
			return err(
				new ConfigurationError(ENV_LOG_LEVEL, logLevel, `must be one of ${LOG_LEVELS.join(', ')}`)
			);
		}

		return ok({
			initialCapacity: initialCapacity.value,
			maxCapacity: maxCapacity.value,
			logDir: this.getEnvVar(ENV_LOG_DIR) ?? DEFAULT_HIT_LIST_CONFIG.logDir,
			logLevel,
		});
	}

	/**
	 * Get environment variable; empty strings count as unset
	 */
	private getEnvVar(key: string): string | undefined {
		const value = this.env[key];
		return value === undefined || value.trim() === '' ? undefined : value.trim();
	}

	/**
	 * Get environment variable as a positive integer
	 */
	private getEnvInteger(key: string, fallback: number): Result<number, ConfigurationError> {
		const value = this.getEnvVar(key);
		if (value === undefined) {
			return ok(fallback);
		}

		if (!/^\d+$/.test(value)) {
			return err(new ConfigurationError(key, value, 'must be a positive integer'));
		}

		const num = parseInt(value, 10);
		if (num < 1) {
			return err(new ConfigurationError(key, num, 'must be at least 1'));
		}

		return ok(num);
	}
}

function isMissingFile(error: Error): boolean {
	return 'code' in error && error.code === 'ENOENT';
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/**
 * Create a configuration manager instance
 *
 * @param envPath - Optional path to .env file
 * @returns Configuration manager
 */
export function createConfigManager(envPath?: string): ConfigurationManager {
	return new ConfigurationManager(envPath);
}
