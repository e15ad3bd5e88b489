/**
 * Connector Types
 */

/** Name of the single connector instance the harness manages */
export const CONNECTOR_NAME = "outbox-connector";

/**
 * Database coordinates handed to the connector
 */
export interface ConnectionParameters {
	readonly hostname: string;
	readonly port: number;
	readonly databaseName: string;
	readonly username: string;
	readonly password: string;
}

/**
 * Connection parameters plus the logical server name (mirrors databaseName)
 */
export interface ConnectorConnectionConfig extends ConnectionParameters {
	readonly serverName: string;
}

/**
 * Registration request for the management API
 */
export interface ConnectorConfiguration {
	readonly name: string;
	readonly config: ConnectorConnectionConfig;
	/** Additional connector properties, sent as-is */
	readonly properties: Readonly<Record<string, string>>;
}

/**
 * Connector states reported by Kafka Connect
 */
export type ConnectorState = "UNASSIGNED" | "RUNNING" | "PAUSED" | "FAILED" | "RESTARTING" | "STOPPED" | (string & {});
