/**
 * Structured Logging Module
 *
 * Provides structured logging for hit-list events (growth, merges, reuse,
 * allocation failures) using JSON Lines (.jsonl) format for easy parsing.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Hit-list operations that produce list events
 */
export type ListOperation = 'grow' | 'merge' | 'reuse' | 'destroy' | 'allocation_failed';

/**
 * Hit-list event log entry
 */
export interface ListEventLog extends BaseLogEntry {
	type: 'list_event';
	operation: ListOperation;
	size: number;
	capacity: number;
	context?: Record<string, unknown>;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Union type for all log entries
 */
export type LogEntry = ListEventLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files (default: none, no file output) */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
	/** Send every console entry to stderr, leaving stdout to command output */
	stderrOnly?: boolean;
}

/**
 * Structured logger for hit-list operations
 */
export class Logger {
	private logDir: string | null;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;
	private stderrOnly: boolean;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir ?? null;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';
		this.stderrOnly = config.stderrOnly ?? false;

		this.ensureLogDirectory();
	}

	/**
	 * Ensure log directory exists
	 */
	private ensureLogDirectory(): void {
		if (this.logDir !== null && !fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true });
		}
	}

	/**
	 * Get log file path for a specific log type
	 */
	getLogFilePath(logType: string): string | null {
		return this.logDir === null ? null : path.join(this.logDir, `${logType}.jsonl`);
	}

	/**
	 * Write log entry to file
	 */
	private writeLogEntry(logType: string, entry: LogEntry): void {
		const logFile = this.getLogFilePath(logType);
		if (logFile === null) {
			return;
		}

		const logLine = JSON.stringify(entry) + '\n';

		try {
			fs.appendFileSync(logFile, logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	/**
	 * Output to console if enabled
	 */
	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;

		if (this.stderrOnly) {
			console.error(prefix, JSON.stringify(entry, null, 2));
			return;
		}

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, JSON.stringify(entry, null, 2));
				break;
			case 'warn':
				console.warn(prefix, JSON.stringify(entry, null, 2));
				break;
			default:
				console.log(prefix, JSON.stringify(entry, null, 2));
		}
	}

	/**
	 * Log a hit-list event
	 */
	logListEvent(
		operation: ListOperation,
		size: number,
		capacity: number,
		context?: Record<string, unknown>
	): void {
		const entry: ListEventLog = {
			timestamp: new Date().toISOString(),
			level: operation === 'allocation_failed' ? 'warn' : 'debug',
			type: 'list_event',
			operation,
			size,
			capacity,
			context,
		};

		this.writeLogEntry('list-events', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: GeneralLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		};

		this.writeLogEntry('general', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Convenience methods for different log levels
	 */
	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log('fatal', message, context);
	}
}

/**
 * Default logger instance
 */
export const logger = new Logger();
