/**
 * Loading of the JSON data files shipped in data/
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { ZodType, ZodTypeDef } from 'zod';
import { Result, ok, err, trySync } from './result-types.js';
import { ConfigError } from './env-config.js';

// src/lib and dist/lib both sit two levels below the package root
const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Absolute path of a file in the data directory
 */
export function dataFilePath(name: string): string {
	return fileURLToPath(new URL(name, DATA_DIR));
}

/**
 * Read a JSON data file and validate it against a schema
 */
export function loadDataFile<T, I>(name: string, schema: ZodType<T, ZodTypeDef, I>): Result<T, ConfigError> {
	const filePath = dataFilePath(name);

	return trySync(
		(): unknown => JSON.parse(readFileSync(filePath, 'utf-8')),
		(error) => new ConfigError(`Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
	).andThen((raw) => {
		const parsed = schema.safeParse(raw);
		if (!parsed.success) {
			const issues = parsed.error.issues
				.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
				.join('; ');
			return err(new ConfigError(`Invalid data file ${name}: ${issues}`));
		}
		return ok(parsed.data);
	});
}
