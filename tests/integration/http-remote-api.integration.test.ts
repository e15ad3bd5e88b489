/**
 * HTTP Remote Connector API Integration Tests
 *
 * Runs HttpRemoteConnectorApi and ConnectorLifecycleClient against the
 * in-process fake Kafka Connect server.
 */

import {
	ConnectorApiError,
	ConnectorLifecycleClient,
	HttpRemoteConnectorApi,
	RegistrationError,
	TimeoutError,
	buildConnectorConfiguration,
} from "outbox-harness";
import type { ConnectionParameters } from "outbox-harness";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeConnectServer } from "../mocks/fake-connect-server";

const parameters: ConnectionParameters = {
	hostname: "host.docker.internal",
	port: 5432,
	databaseName: "inventory",
	username: "postgres",
	password: "postgres",
};

describe("HttpRemoteConnectorApi", () => {
	let server: FakeConnectServer;
	let api: HttpRemoteConnectorApi;

	beforeEach(async () => {
		server = new FakeConnectServer();
		await server.start();
		api = new HttpRemoteConnectorApi({ baseUrl: server.url, requestTimeout: 2000 });
	});

	afterEach(async () => {
		await server.stop();
	});

	describe("registerOutboxConnector", () => {
		it("should POST the flattened configuration", async () => {
			await api.registerOutboxConnector(buildConnectorConfiguration(parameters));

			expect(server.requests).toHaveLength(1);
			const [request] = server.requests;
			expect(request.method).toBe("POST");
			expect(request.path).toBe("/connectors");
			expect(request.body).toMatchObject({
				name: "outbox-connector",
				config: {
					"database.hostname": "host.docker.internal",
					"database.port": "5432",
					"database.user": "postgres",
					"database.password": "postgres",
					"database.dbname": "inventory",
					"database.server.name": "inventory",
				},
			});
		});

		it("should fail with 409 when the connector already exists", async () => {
			await api.registerOutboxConnector(buildConnectorConfiguration(parameters));

			const error = await api
				.registerOutboxConnector(buildConnectorConfiguration(parameters))
				.catch((err: unknown) => err);

			expect(error).toBeInstanceOf(RegistrationError);
			expect((error as RegistrationError).status).toBe(409);
			expect((error as RegistrationError).detail).toBe("Connector outbox-connector already exists");
		});

		it("should carry the remote error message", async () => {
			server.configure({ registrationError: { code: 400, message: "Connector configuration is invalid" } });

			await expect(api.registerOutboxConnector(buildConnectorConfiguration(parameters))).rejects.toThrow(
				"Failed to register connector outbox-connector: 400 Bad Request - Connector configuration is invalid",
			);
		});

		it("should fail when the service is unreachable", async () => {
			const url = server.url;
			await server.stop();
			const unreachable = new HttpRemoteConnectorApi({ baseUrl: url });

			const error = await unreachable
				.registerOutboxConnector(buildConnectorConfiguration(parameters))
				.catch((err: unknown) => err);

			expect(error).toBeInstanceOf(RegistrationError);
			expect((error as RegistrationError).status).toBeUndefined();
			expect((error as RegistrationError).cause).toBeDefined();
		});
	});

	describe("outboxConnectorStatus", () => {
		it("should read the connector status", async () => {
			server.configure({ states: ["UNASSIGNED"] });
			await api.registerOutboxConnector(buildConnectorConfiguration(parameters));

			const status = await api.outboxConnectorStatus();

			expect(status.name).toBe("outbox-connector");
			expect(status.state).toBe("UNASSIGNED");
			expect(status.connectorState.workerId).toBe("127.0.0.1:8083");
			expect(status.isRunning()).toBe(false);
			expect(server.requests[1].path).toBe("/connectors/outbox-connector/status");
		});

		it("should fail with ConnectorApiError for an unknown connector", async () => {
			const error = await api.outboxConnectorStatus().catch((err: unknown) => err);

			expect(error).toBeInstanceOf(ConnectorApiError);
			expect((error as ConnectorApiError).status).toBe(404);
			expect((error as ConnectorApiError).detail).toBe("No status found for connector outbox-connector");
		});

		it("should use the configured connector name", async () => {
			const custom = new HttpRemoteConnectorApi({ baseUrl: server.url, connectorName: "orders connector" });

			await custom.outboxConnectorStatus().catch(() => undefined);

			expect(server.requests[0].path).toBe("/connectors/orders%20connector/status");
		});
	});

	describe("removeOutboxConnector", () => {
		it("should delete the connector", async () => {
			await api.registerOutboxConnector(buildConnectorConfiguration(parameters));

			await api.removeOutboxConnector();

			expect(server.registered.size).toBe(0);
			expect(server.requests[1]).toMatchObject({ method: "DELETE", path: "/connectors/outbox-connector" });
		});

		it("should tolerate a missing connector", async () => {
			await expect(api.removeOutboxConnector()).resolves.toBeUndefined();
		});
	});

	describe("with ConnectorLifecycleClient", () => {
		it("should wait through unavailable and unassigned polls", async () => {
			server.configure({ unavailablePolls: 2, states: ["UNASSIGNED", "RUNNING"] });
			const client = new ConnectorLifecycleClient(api, { pollInterval: 10 });

			const result = await client.registerAndWaitUntilRunning(parameters);

			expect(result.attempts).toBe(4);
			expect(result.status.isRunning()).toBe(true);
			expect(client.state).toBe("running");
		});

		it("should time out when the connector keeps failing", async () => {
			server.configure({ states: ["FAILED"] });
			const client = new ConnectorLifecycleClient(api, { timeout: 200, pollInterval: 20 });
			const startedAt = Date.now();

			const error = await client.registerAndWaitUntilRunning(parameters).catch((err: unknown) => err);

			expect(error).toBeInstanceOf(TimeoutError);
			expect((error as TimeoutError).lastState).toBe("FAILED");
			expect(Date.now() - startedAt).toBeGreaterThanOrEqual(200);
		});
	});
});
