/**
 * Remote Connector API
 *
 * Capability the lifecycle client talks to. One HTTP implementation is
 * provided; tests bind a stub.
 */

import type { ConnectorConfiguration, ConnectorStatus } from "../connector";

export interface RemoteConnectorApi {
	/** Submit the connector; rejects with RegistrationError */
	registerOutboxConnector(configuration: ConnectorConfiguration): Promise<void>;
	/** Current status of the outbox connector */
	outboxConnectorStatus(): Promise<ConnectorStatus>;
	/** Delete the outbox connector; a missing connector is not an error */
	removeOutboxConnector?(): Promise<void>;
}

export interface HttpRemoteConnectorApiOptions {
	/** Kafka Connect REST base URL (default: http://localhost:8083) */
	baseUrl?: string;
	/** Connector name (default: CONNECTOR_NAME) */
	connectorName?: string;
	/** Per-request timeout in milliseconds (default: 5000) */
	requestTimeout?: number;
	/** Extra request headers */
	headers?: Record<string, string>;
}
