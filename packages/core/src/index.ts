/**
 * Outbox Harness Core
 *
 * Registers a Debezium outbox connector on Kafka Connect before each
 * integration test and waits until it is running.
 *
 * For Vitest hooks, install:
 * - @outbox-harness/vitest - `useOutboxConnector()`
 *
 * @example
 * ```typescript
 * import { ConnectorLifecycleClient, HttpRemoteConnectorApi, createConfig, resolveConnectionParameters } from "outbox-harness";
 *
 * const parameters = resolveConnectionParameters(createConfig());
 * const client = new ConnectorLifecycleClient(new HttpRemoteConnectorApi({ baseUrl: "http://localhost:8083" }));
 * await client.registerAndWaitUntilRunning(parameters);
 * ```
 */

// Errors (ConfigurationError, RegistrationError, TimeoutError, ...)
export * from "./errors";
// Logging
export * from "./logging/logger";
// Ambient configuration (Config, sources)
export * from "./config";
// Connector model (ConnectionParameters, ConnectorConfiguration, ConnectorStatus)
export * from "./connector";
// Connection resolver
export * from "./resolver/connection.resolver";
// Remote API (RemoteConnectorApi, HttpRemoteConnectorApi)
export * from "./remote";
// Lifecycle (ConnectorLifecycleClient, InitOutboxConnectorBeforeEachCallback)
export * from "./lifecycle";
