/**
 * Configuration Management
 *
 * Reads the parsing and discovery policy from environment variables, with
 * optional .env file support.
 */

import { config as loadEnv } from 'dotenv';
import { Result, ok, err } from './result-types.js';
import { isLogLevel, logger, type LogLevel } from './logger.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Policy shared by the universal parser and source discovery
 */
export interface CoreConfig {
	/** Largest file (bytes) that will be read and parsed */
	maxFileSize: number;

	/** Follow symbolic links during discovery */
	followSymlinks: boolean;

	/** Include dotfiles and dot-directories during discovery */
	includeHidden: boolean;

	/** Honour .gitignore and .polyglotignore during discovery */
	respectIgnoreFiles: boolean;

	/** Minimum console log level */
	logLevel: LogLevel;

	/** Directory for .jsonl log files */
	logDir?: string;
}

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

export const DEFAULT_CONFIG: CoreConfig = {
	maxFileSize: DEFAULT_MAX_FILE_SIZE,
	followSymlinks: false,
	includeHidden: false,
	respectIgnoreFiles: true,
	logLevel: 'warn',
};

// ============================================================================
// Configuration Error
// ============================================================================

/**
 * Configuration error
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Variables (all optional):
 * - POLYGLOT_MAX_FILE_SIZE (bytes)
 * - POLYGLOT_FOLLOW_SYMLINKS, POLYGLOT_INCLUDE_HIDDEN, POLYGLOT_RESPECT_IGNORE ("true"/"1")
 * - POLYGLOT_LOG_LEVEL (debug | info | warn | error | fatal)
 * - POLYGLOT_LOG_DIR
 */
export class ConfigurationManager {
	constructor(
		private envPath?: string,
		private env: NodeJS.ProcessEnv = process.env
	) {}

	/**
	 * Load variables from a .env file into process.env (a missing file is not an error)
	 */
	loadEnv(): Result<void, ConfigError> {
		try {
			loadEnv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigError(
					`Failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`
				)
			);
		}
	}

	/**
	 * Build the core configuration from the environment
	 */
	getCoreConfig(): Result<CoreConfig, ConfigError> {
		const rawMax = this.getEnvVar('POLYGLOT_MAX_FILE_SIZE');
		let maxFileSize = DEFAULT_CONFIG.maxFileSize;
		if (rawMax !== undefined) {
			const parsed = this.getEnvNumber('POLYGLOT_MAX_FILE_SIZE');
			if (parsed === undefined || parsed <= 0) {
				return err(
					new ConfigError(
						`Invalid POLYGLOT_MAX_FILE_SIZE "${rawMax}": expected a positive integer`
					)
				);
			}
			maxFileSize = parsed;
		}

		const rawLevel = this.getEnvVar('POLYGLOT_LOG_LEVEL');
		let logLevel = DEFAULT_CONFIG.logLevel;
		if (rawLevel !== undefined) {
			const level = rawLevel.toLowerCase();
			if (!isLogLevel(level)) {
				return err(
					new ConfigError(
						`Invalid POLYGLOT_LOG_LEVEL "${rawLevel}". Valid levels: debug, info, warn, error, fatal`
					)
				);
			}
			logLevel = level;
		}

		return ok({
			maxFileSize,
			followSymlinks: this.getEnvBoolean('POLYGLOT_FOLLOW_SYMLINKS') ?? DEFAULT_CONFIG.followSymlinks,
			includeHidden: this.getEnvBoolean('POLYGLOT_INCLUDE_HIDDEN') ?? DEFAULT_CONFIG.includeHidden,
			respectIgnoreFiles: this.getEnvBoolean('POLYGLOT_RESPECT_IGNORE') ?? DEFAULT_CONFIG.respectIgnoreFiles,
			logLevel,
			logDir: this.getEnvVar('POLYGLOT_LOG_DIR'),
		});
	}

	private getEnvVar(key: string): string | undefined {
		const value = this.env[key];
		return value === '' ? undefined : value;
	}

	private getEnvNumber(key: string): number | undefined {
		const value = this.getEnvVar(key);
		if (!value || !/^\d+$/.test(value.trim())) return undefined;
		return parseInt(value, 10);
	}

	private getEnvBoolean(key: string): boolean | undefined {
		const value = this.getEnvVar(key);
		if (!value) return undefined;
		return value.toLowerCase() === 'true' || value === '1';
	}
}

/**
 * Create a configuration manager instance
 *
 * @param envPath - Optional path to .env file
 * @param env - Variables to read (default: process.env)
 */
export function createConfigManager(envPath?: string, env?: NodeJS.ProcessEnv): ConfigurationManager {
	return new ConfigurationManager(envPath, env);
}

/**
 * Load the configuration and apply its logging settings to the default logger
 */
export function loadCoreConfig(envPath?: string): Result<CoreConfig, ConfigError> {
	const manager = createConfigManager(envPath);
	return manager
		.loadEnv()
		.andThen(() => manager.getCoreConfig())
		.map((config) => {
			logger.configure({ consoleLevel: config.logLevel, logDir: config.logDir });
			return config;
		});
}
