/**
 * Configuration Sources
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "dotenv";
import type { ConfigSource } from "./config.types";

/**
 * Candidate environment variable names for a property name:
 * the name itself, then non-alphanumerics replaced by "_", then upper-cased.
 *
 * @example
 * ```typescript
 * envNames("%test.quarkus.datasource.jdbc.url");
 * // ["%test.quarkus.datasource.jdbc.url", "_test_quarkus_datasource_jdbc_url", "_TEST_QUARKUS_DATASOURCE_JDBC_URL"]
 * ```
 */
export function envNames(key: string): string[] {
	const sanitized = key.replace(/[^a-zA-Z0-9]/g, "_");
	return [...new Set([key, sanitized, sanitized.toUpperCase()])];
}

function lookupEnvStyle(values: Record<string, string | undefined>, key: string): string | undefined {
	for (const name of envNames(key)) {
		const value = values[name];
		if (value !== undefined) {
			return value;
		}
	}
	return undefined;
}

/**
 * In-memory values
 */
export class MapConfigSource implements ConfigSource {
	readonly name: string;
	readonly ordinal: number;
	private values: Map<string, string>;

	constructor(values: Record<string, string> = {}, options: { name?: string; ordinal?: number } = {}) {
		this.values = new Map(Object.entries(values));
		this.name = options.name ?? "map";
		this.ordinal = options.ordinal ?? 100;
	}

	getValue(key: string): string | undefined {
		return this.values.get(key);
	}

	set(key: string, value: string): this {
		this.values.set(key, value);
		return this;
	}

	delete(key: string): this {
		this.values.delete(key);
		return this;
	}
}

/**
 * Process environment
 */
export class EnvConfigSource implements ConfigSource {
	readonly name = "env";
	readonly ordinal = 300;

	constructor(private env: NodeJS.ProcessEnv = process.env) {}

	getValue(key: string): string | undefined {
		return lookupEnvStyle(this.env, key);
	}
}

/**
 * `.env` file in the working directory, read once at construction.
 * A missing file yields an empty source.
 */
export class DotEnvConfigSource implements ConfigSource {
	readonly name: string;
	readonly ordinal = 295;
	private values: Record<string, string>;

	constructor(path = ".env") {
		const file = resolve(path);
		this.name = `dotenv:${file}`;
		this.values = existsSync(file) ? parse(readFileSync(file)) : {};
	}

	getValue(key: string): string | undefined {
		return lookupEnvStyle(this.values, key);
	}
}
