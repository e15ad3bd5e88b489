/**
 * Connection Resolver
 *
 * Derives the database coordinates the connector should use from the
 * datasource configuration of the application under test.
 *
 * @example
 * ```typescript
 * // quarkus.datasource.jdbc.url=jdbc:postgresql://localhost:5432/inventory
 * const parameters = resolveConnectionParameters(createConfig());
 * // { hostname: "host.docker.internal", port: 5432, databaseName: "inventory", ... }
 * ```
 */

import type { Config } from "../config";
import type { ConnectionParameters } from "../connector";
import { ConfigurationError } from "../errors";

/** Datasource URL keys, in priority order */
export const DATASOURCE_URL_KEYS = ["quarkus.datasource.jdbc.url", "quarkus.datasource.reactive.url"] as const;
export const DATASOURCE_USERNAME_KEY = "quarkus.datasource.username";
export const DATASOURCE_PASSWORD_KEY = "quarkus.datasource.password";

const REACTIVE_PREFIX = "vertx-reactive:";
const JDBC_PREFIX = "jdbc:";
const LOOPBACK_HOST = "localhost";
/** Name under which the host is reachable from inside a container */
export const CONTAINER_HOST_ALIAS = "host.docker.internal";

export interface DatasourceUrl {
	key: string;
	url: string;
}

export interface ParsedDatasourceUrl {
	hostname: string;
	port: number;
	databaseName: string;
}

/**
 * First configured datasource URL among the candidate keys
 */
export function findDatasourceUrl(config: Config, keys: readonly string[] = DATASOURCE_URL_KEYS): DatasourceUrl {
	for (const key of keys) {
		const url = config.getOptionalValue(key);
		if (url !== undefined) {
			return { key, url };
		}
	}
	throw new ConfigurationError(`No datasource URL configured (looked up ${keys.join(", ")})`);
}

/**
 * Drop the reactive driver marker and point loopback at the container host alias.
 * Plain substring replacement: "127.0.0.1" is left alone.
 */
export function normalizeDatasourceUrl(url: string): string {
	return url.replaceAll(REACTIVE_PREFIX, "").replaceAll(LOOPBACK_HOST, CONTAINER_HOST_ALIAS);
}

/**
 * Split a (normalized) datasource URL into host, port and database name
 *
 * @param key - configuration key the URL came from, for error messages
 */
export function parseDatasourceUrl(url: string, key?: string): ParsedDatasourceUrl {
	const source = key ? ` (${key})` : "";
	const uri = url.startsWith(JDBC_PREFIX) ? url.slice(JDBC_PREFIX.length) : url;

	let parsed: URL;
	try {
		parsed = new URL(uri);
	} catch (error) {
		throw new ConfigurationError(`Malformed datasource URL${source}: ${url}`, key, { cause: error });
	}

	if (!parsed.hostname) {
		throw new ConfigurationError(`Datasource URL has no host${source}: ${url}`, key);
	}
	if (!parsed.port) {
		throw new ConfigurationError(`Datasource URL has no port${source}: ${url}`, key);
	}

	const databaseName = parsed.pathname.slice(1);
	if (!databaseName) {
		throw new ConfigurationError(`Datasource URL has no database name${source}: ${url}`, key);
	}

	return {
		hostname: parsed.hostname,
		port: Number.parseInt(parsed.port, 10),
		databaseName,
	};
}

/**
 * Resolve the connection parameters from ambient configuration
 */
export function resolveConnectionParameters(config: Config): ConnectionParameters {
	const { key, url } = findDatasourceUrl(config);
	const { hostname, port, databaseName } = parseDatasourceUrl(normalizeDatasourceUrl(url), key);

	return Object.freeze({
		hostname,
		port,
		databaseName,
		username: config.getValue(DATASOURCE_USERNAME_KEY),
		password: config.getValue(DATASOURCE_PASSWORD_KEY),
	});
}
