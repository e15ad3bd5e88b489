/**
 * Register Connector Example
 *
 * Registers the outbox connector by hand, outside any test runner.
 * Reads the datasource from the environment / .env, e.g.
 *
 *   QUARKUS_DATASOURCE_JDBC_URL=jdbc:postgresql://localhost:5432/inventory
 *   QUARKUS_DATASOURCE_USERNAME=postgres
 *   QUARKUS_DATASOURCE_PASSWORD=postgres
 *   OUTBOX_CONNECT_URL=http://localhost:8083
 */

import {
	CONNECT_URL_KEY,
	ConnectorLifecycleClient,
	DEFAULT_CONNECT_URL,
	HttpRemoteConnectorApi,
	createConfig,
	createConsoleLogger,
	resolveConnectionParameters,
} from "outbox-harness";

export async function registerOutboxConnector(): Promise<void> {
	const config = createConfig();
	const parameters = resolveConnectionParameters(config);
	const api = new HttpRemoteConnectorApi({ baseUrl: config.getOptionalValue(CONNECT_URL_KEY) ?? DEFAULT_CONNECT_URL });

	const client = new ConnectorLifecycleClient(api, {
		timeout: 60_000,
		connectorProperties: { "table.include.list": "public.outboxevent" },
		logger: createConsoleLogger("Example", { debug: true }),
	});

	const { status, elapsed } = await client.registerAndWaitUntilRunning(parameters);
	console.log(`${status.name} is ${status.state} after ${elapsed}ms`);
}
