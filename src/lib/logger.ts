/**
 * Structured Logging Module
 *
 * JSON log entries for parse failures, skipped discovery entries and general
 * messages. Console output is filtered by level; when a log directory is
 * configured, entries are also appended as JSON Lines (.jsonl).
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
 * A file that could not be parsed
 */
export interface ParseFailureLog extends BaseLogEntry {
	type: 'parse_failure';
	path: string;
	error_code: string;
	error_message: string;
	context?: Record<string, unknown>;
}

/**
 * A discovery entry that was skipped
 */
export interface DiscoverySkipLog extends BaseLogEntry {
	type: 'discovery_skip';
	path: string;
	reason: string;
	error_message?: string;
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
export type LogEntry = ParseFailureLog | DiscoverySkipLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for .jsonl files; no files are written when unset */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Structured logger
 */
export class Logger {
	private logDir?: string;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';

		if (this.logDir) {
			this.ensureLogDirectory(this.logDir);
		}
	}

	/**
	 * Apply a new configuration in place
	 */
	configure(config: LoggerConfig): void {
		if (config.logDir !== undefined) {
			this.logDir = config.logDir;
			this.ensureLogDirectory(config.logDir);
		}
		if (config.console !== undefined) {
			this.consoleEnabled = config.console;
		}
		if (config.consoleLevel !== undefined) {
			this.consoleLevel = config.consoleLevel;
		}
	}

	private ensureLogDirectory(logDir: string): void {
		if (!fs.existsSync(logDir)) {
			fs.mkdirSync(logDir, { recursive: true });
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
	 * Output to console if enabled and at or above the threshold
	 */
	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, JSON.stringify(entry));
				break;
			case 'warn':
				console.warn(prefix, JSON.stringify(entry));
				break;
			default:
				console.log(prefix, JSON.stringify(entry));
		}
	}

	/**
	 * Log a file that failed to parse
	 */
	logParseFailure(
		filePath: string,
		error: { code: string; message: string },
		context?: Record<string, unknown>
	): void {
		const entry: ParseFailureLog = {
			timestamp: new Date().toISOString(),
			level: 'error',
			type: 'parse_failure',
			path: filePath,
			error_code: error.code,
			error_message: error.message,
			context,
		};

		this.writeLogEntry('parse-failures', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a discovery entry that was skipped
	 */
	logDiscoverySkip(filePath: string, reason: string, error?: Error): void {
		const entry: DiscoverySkipLog = {
			timestamp: new Date().toISOString(),
			level: error ? 'warn' : 'debug',
			type: 'discovery_skip',
			path: filePath,
			reason,
			error_message: error?.message,
		};

		this.writeLogEntry('discovery', entry);
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
}

/**
 * Default logger instance
 */
export const logger = new Logger();
