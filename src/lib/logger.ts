/**
 * Structured Logging Module
 *
 * Writes JSON Lines (.jsonl) entries for general messages and cache
 * lifecycle events, with optional console echo.
 */

import * as fs from 'fs';
import * as path from 'path';

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
 * Cache lifecycle events
 */
export type CacheEvent =
	| 'validated'
	| 'rebuild_started'
	| 'rebuild_completed'
	| 'rebuild_failed'
	| 'cleared';

/**
 * Why the cache manager took the path it took
 */
export type CacheEventReason =
	| 'fingerprint_mismatch'
	| 'model_changed'
	| 'schema_version_changed'
	| 'missing'
	| 'corrupt'
	| 'dimension_mismatch'
	| 'forced'
	| 'none';

/**
 * Cache event log entry
 */
export interface CacheEventLog extends BaseLogEntry {
	type: 'cache_event';
	collection: string;
	event: CacheEvent;
	reason: CacheEventReason;
	message: string;
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
export type LogEntry = CacheEventLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files; null disables file output (default: .qctx/logs) */
	logDir?: string | null;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

export class Logger {
	private logDir: string | null;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;
	private logDirReady = false;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir === undefined ? '.qctx/logs' : config.logDir;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';
	}

	/**
	 * Change the console threshold (CLI --verbose / --quiet)
	 */
	setConsoleLevel(level: LogLevel): void {
		this.consoleLevel = level;
	}

	private writeLogEntry(logType: string, entry: LogEntry): void {
		if (this.logDir === null) {
			return;
		}

		const logLine = JSON.stringify(entry) + '\n';

		try {
			if (!this.logDirReady) {
				fs.mkdirSync(this.logDir, { recursive: true });
				this.logDirReady = true;
			}
			fs.appendFileSync(path.join(this.logDir, `${logType}.jsonl`), logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;
		const suffix = entry.context ? ` ${JSON.stringify(entry.context)}` : '';

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, entry.message + suffix);
				break;
			case 'warn':
				console.warn(prefix, entry.message + suffix);
				break;
			default:
				console.log(prefix, entry.message + suffix);
		}
	}

	/**
	 * Log a cache lifecycle event together with the reason behind it
	 */
	logCacheEvent(
		collection: string,
		event: CacheEvent,
		reason: CacheEventReason,
		context?: LogContext
	): void {
		const level: LogLevel =
			event === 'rebuild_failed' ? 'error' : reason === 'corrupt' ? 'warn' : 'info';

		const entry: CacheEventLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'cache_event',
			collection,
			event,
			reason,
			message: `${collection}: ${event.replace('_', ' ')} (${reason})`,
			context,
		};

		this.writeLogEntry('cache-events', entry);
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

/**
 * Default logger instance
 */
export const logger = new Logger();
