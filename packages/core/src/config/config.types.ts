/**
 * Configuration Types
 */

/**
 * A single origin of configuration values (environment, .env file, in-memory map)
 */
export interface ConfigSource {
	/** Source name, used in diagnostics */
	readonly name: string;
	/** Higher ordinals win */
	readonly ordinal: number;
	/** Raw lookup; undefined when the source does not define the key */
	getValue(key: string): string | undefined;
}

/**
 * Ambient configuration lookup consumed by the resolver
 */
export interface Config {
	/** Value for key, or undefined when no source defines a non-empty value */
	getOptionalValue(key: string): string | undefined;
	/** Value for key; throws ConfigurationError when absent */
	getValue(key: string): string;
}

export interface ConfigOptions {
	/** Sources to consult (default: environment and .env file) */
	sources?: ConfigSource[];
	/** Active profile; `%profile.key` takes precedence over `key` (default: "test") */
	profile?: string | null;
}
