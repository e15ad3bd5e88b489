/**
 * Connector Configuration
 *
 * Builds the registration request and its wire form: a flat map of
 * Debezium property names to string values.
 */

import type { ConnectionParameters, ConnectorConfiguration } from "./connector.types";
import { CONNECTOR_NAME } from "./connector.types";

/**
 * Outbox connector defaults (PostgreSQL source + EventRouter transform)
 */
export const DEFAULT_CONNECTOR_PROPERTIES: Readonly<Record<string, string>> = Object.freeze({
	"connector.class": "io.debezium.connector.postgresql.PostgresConnector",
	"tasks.max": "1",
	"plugin.name": "pgoutput",
	"tombstones.on.delete": "false",
	transforms: "outbox",
	"transforms.outbox.type": "io.debezium.transforms.outbox.EventRouter",
	"transforms.outbox.route.topic.replacement": "${routedByValue}.events",
	"transforms.outbox.table.fields.additional.placement": "type:header:eventType",
});

/**
 * Wire body of a registration request
 */
export interface ConnectorRegistrationBody {
	name: string;
	config: Record<string, string>;
}

/**
 * Build a fresh configuration for one registration attempt
 */
export function buildConnectorConfiguration(
	parameters: ConnectionParameters,
	properties: Record<string, string> = {},
): ConnectorConfiguration {
	return {
		name: CONNECTOR_NAME,
		config: {
			hostname: parameters.hostname,
			port: parameters.port,
			databaseName: parameters.databaseName,
			username: parameters.username,
			password: parameters.password,
			serverName: parameters.databaseName,
		},
		properties: { ...properties },
	};
}

/**
 * Flatten a configuration into the body Kafka Connect expects.
 *
 * Precedence: connection values > caller properties > defaults.
 * `topic.prefix` defaults to the server name.
 */
export function toRegistrationBody(configuration: ConnectorConfiguration): ConnectorRegistrationBody {
	const { config } = configuration;
	return {
		name: configuration.name,
		config: {
			...DEFAULT_CONNECTOR_PROPERTIES,
			"topic.prefix": config.serverName,
			...configuration.properties,
			"database.hostname": config.hostname,
			"database.port": String(config.port),
			"database.user": config.username,
			"database.password": config.password,
			"database.dbname": config.databaseName,
			"database.server.name": config.serverName,
		},
	};
}
