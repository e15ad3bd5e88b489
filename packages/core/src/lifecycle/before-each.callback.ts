/**
 * Before-Each Callback
 *
 * Extension point invoked by a test runner before each test method:
 * resolves the datasource, registers the outbox connector and waits
 * for it to run. Any failure rejects, aborting the test.
 *
 * @example
 * ```typescript
 * const callback = new InitOutboxConnectorBeforeEachCallback();
 * beforeEach((ctx) => callback.beforeEach(ctx), callback.timeout + 5000);
 * ```
 */

import type { Config } from "../config";
import { createConfig } from "../config";
import type { Logger } from "../logging/logger";
import { createConsoleLogger } from "../logging/logger";
import type { RemoteConnectorApi } from "../remote";
import { DEFAULT_CONNECT_URL, HttpRemoteConnectorApi } from "../remote";
import { resolveConnectionParameters } from "../resolver/connection.resolver";
import type { ConnectorLifecycleClientOptions } from "./lifecycle.client";
import { ConnectorLifecycleClient, DEFAULT_REGISTRATION_TIMEOUT } from "./lifecycle.client";

/** Configuration key for the Kafka Connect REST base URL */
export const CONNECT_URL_KEY = "outbox.connect.url";

/**
 * Test-runner extension contract; the context is opaque to the harness
 */
export interface BeforeEachCallback<TContext = unknown> {
	beforeEach(context: TContext): Promise<void>;
}

export type RemoteConnectorApiFactory = (config: Config) => RemoteConnectorApi;

export interface OutboxConnectorCallbackOptions extends Omit<ConnectorLifecycleClientOptions, "logger"> {
	/** Ambient configuration (default: environment + .env, created on each call) */
	config?: Config;
	/** API instance or factory (default: HttpRemoteConnectorApi) */
	api?: RemoteConnectorApi | RemoteConnectorApiFactory;
	/** Kafka Connect base URL; overrides `outbox.connect.url` */
	connectUrl?: string;
	/** Per-request timeout for the default HTTP client */
	requestTimeout?: number;
	logger?: Logger;
}

export class InitOutboxConnectorBeforeEachCallback implements BeforeEachCallback {
	/** Registration deadline in milliseconds */
	readonly timeout: number;
	private readonly logger: Logger;
	private lastApi: RemoteConnectorApi | undefined;

	constructor(private readonly options: OutboxConnectorCallbackOptions = {}) {
		this.timeout = options.timeout ?? DEFAULT_REGISTRATION_TIMEOUT;
		this.logger = options.logger ?? createConsoleLogger("Outbox Connector");
	}

	async beforeEach(_context?: unknown): Promise<void> {
		const config = this.options.config ?? createConfig();
		const parameters = resolveConnectionParameters(config);
		const api = this.createApi(config);
		this.lastApi = api;

		const client = new ConnectorLifecycleClient(api, {
			timeout: this.timeout,
			pollInterval: this.options.pollInterval,
			connectorProperties: this.options.connectorProperties,
			logger: this.logger,
		});
		await client.registerAndWaitUntilRunning(parameters);
	}

	/**
	 * Remove the connector registered by the last `beforeEach`, if the API supports it
	 */
	async afterEach(_context?: unknown): Promise<void> {
		const api = this.lastApi;
		this.lastApi = undefined;
		if (!api?.removeOutboxConnector) {
			return;
		}
		await api.removeOutboxConnector();
		this.logger.debug("Connector removed");
	}

	private createApi(config: Config): RemoteConnectorApi {
		const { api } = this.options;
		if (typeof api === "function") {
			return api(config);
		}
		if (api) {
			return api;
		}
		return new HttpRemoteConnectorApi({
			baseUrl: this.options.connectUrl ?? config.getOptionalValue(CONNECT_URL_KEY) ?? DEFAULT_CONNECT_URL,
			requestTimeout: this.options.requestTimeout,
		});
	}
}
