/**
 * Structured Logging Module
 *
 * Structured logging for index operations, errors, and slow queries
 * using JSON Lines (.jsonl) format for easy parsing and analysis.
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from './result-types.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export type LogContext = Record<string, unknown>;

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Vector index error log entry
 */
export interface IndexErrorLog extends BaseLogEntry {
	type: 'index_error';
	level: 'error' | 'fatal';
	operation: string;
	namespace?: string;
	error_code: string;
	error_message: string;
	stack_trace?: string;
	context?: LogContext;
}

/**
 * Slow query log entry
 */
export interface SlowQueryLog extends BaseLogEntry {
	type: 'slow_query';
	level: 'warn';
	operation: string;
	duration_ms: number;
	result_count?: number;
	threshold_ms: number;
	context?: LogContext;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: LogContext;
}

/**
 * Union type for all log entries
 */
export type LogEntry = IndexErrorLog | SlowQueryLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files; no file output when omitted */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Structured logger for store operations
 */
export class Logger {
	private logDir?: string;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';

		this.ensureLogDirectory();
	}

	/**
	 * Ensure log directory exists
	 */
	private ensureLogDirectory(): void {
		if (this.logDir && !fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true });
		}
	}

	/**
	 * Write log entry to file
	 */
	private writeLogEntry(logType: string, entry: LogEntry): void {
		if (!this.logDir) {
			return;
		}

		const logFile = path.join(this.logDir, `${logType}.jsonl`);
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
		const body = entry.type === 'general' ? entry.message : JSON.stringify(entry);

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, body);
				break;
			case 'warn':
				console.warn(prefix, body);
				break;
			default:
				console.log(prefix, body);
		}
	}

	/**
	 * Log a vector index error
	 */
	logIndexError(
		operation: string,
		error: unknown,
		context?: {
			namespace?: string;
			additionalContext?: LogContext;
		}
	): void {
		const entry: IndexErrorLog = {
			timestamp: new Date().toISOString(),
			level: 'error',
			type: 'index_error',
			operation,
			namespace: context?.namespace,
			error_code: errorCode(error),
			error_message: errorMessage(error),
			stack_trace: error instanceof Error ? error.stack : undefined,
			context: context?.additionalContext,
		};

		this.writeLogEntry('index-errors', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a slow query
	 */
	logSlowQuery(
		operation: string,
		durationMs: number,
		thresholdMs: number,
		context?: {
			resultCount?: number;
			additionalContext?: LogContext;
		}
	): void {
		const entry: SlowQueryLog = {
			timestamp: new Date().toISOString(),
			level: 'warn',
			type: 'slow_query',
			operation,
			duration_ms: Math.round(durationMs),
			result_count: context?.resultCount,
			threshold_ms: thresholdMs,
			context: context?.additionalContext,
		};

		this.writeLogEntry('slow-queries', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: LogContext): void {
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
	debug(message: string, context?: LogContext): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: LogContext): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: LogContext): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: LogContext): void {
		this.log('fatal', message, context);
	}
}

function errorCode(error: unknown): string {
	if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return 'UNKNOWN';
}

/**
 * Logger that writes nowhere; for tests and library callers that bring their own
 */
export function createSilentLogger(): Logger {
	return new Logger({ console: false });
}
