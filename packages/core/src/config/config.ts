/**
 * Ambient Configuration
 *
 * Ordered lookup over config sources. Sources are consulted by descending
 * ordinal; with an active profile, `%profile.key` is looked up in every
 * source before `key` is. Empty values count as absent.
 */

import { ConfigurationError } from "../errors";
import { DotEnvConfigSource, EnvConfigSource } from "./config.sources";
import type { Config, ConfigOptions, ConfigSource } from "./config.types";

export const DEFAULT_PROFILE = "test";

export class SourcedConfig implements Config {
	private readonly sources: ConfigSource[];
	private readonly profile: string | null;

	constructor(options: ConfigOptions = {}) {
		const sources = options.sources ?? [new EnvConfigSource(), new DotEnvConfigSource()];
		this.sources = [...sources].sort((a, b) => b.ordinal - a.ordinal);
		this.profile = options.profile === undefined ? DEFAULT_PROFILE : options.profile;
	}

	getOptionalValue(key: string): string | undefined {
		if (this.profile) {
			const profiled = this.lookup(`%${this.profile}.${key}`);
			if (profiled !== undefined) {
				return profiled;
			}
		}
		return this.lookup(key);
	}

	getValue(key: string): string {
		const value = this.getOptionalValue(key);
		if (value === undefined) {
			throw new ConfigurationError(`Missing required configuration value: ${key}`, key);
		}
		return value;
	}

	getSources(): readonly ConfigSource[] {
		return this.sources;
	}

	private lookup(key: string): string | undefined {
		for (const source of this.sources) {
			const value = source.getValue(key);
			if (value !== undefined && value !== "") {
				return value;
			}
		}
		return undefined;
	}
}

/**
 * Create a config from the given options
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   sources: [new EnvConfigSource(), new MapConfigSource({ "quarkus.datasource.username": "postgres" })],
 * });
 * config.getValue("quarkus.datasource.username");
 * ```
 */
export function createConfig(options?: ConfigOptions): SourcedConfig {
	return new SourcedConfig(options);
}
