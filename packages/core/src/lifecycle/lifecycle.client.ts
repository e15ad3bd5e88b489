/**
 * Connector Lifecycle Client
 *
 * Registers the outbox connector and blocks until it reports RUNNING.
 *
 * not-registered -> registering -> registration-failed
 *                               -> polling -> running
 *                                          -> timed-out
 */

import type { ConnectionParameters, ConnectorStatus } from "../connector";
import { buildConnectorConfiguration } from "../connector";
import { OutboxHarnessError, RegistrationError, TimeoutError } from "../errors";
import type { Logger } from "../logging/logger";
import { silentLogger } from "../logging/logger";
import type { RemoteConnectorApi } from "../remote";
import { describeError } from "../utils";
import type { PollAttempt } from "./poll";
import { pollUntil } from "./poll";

export const DEFAULT_REGISTRATION_TIMEOUT = 30_000;
export const DEFAULT_POLL_INTERVAL = 100;

export type RegistrationState =
	| "not-registered"
	| "registering"
	| "registration-failed"
	| "polling"
	| "running"
	| "timed-out";

export interface ConnectorLifecycleClientOptions {
	/** Deadline for the connector to reach RUNNING (default: 30000) */
	timeout?: number;
	/** Delay between status polls (default: 100) */
	pollInterval?: number;
	/** Extra connector properties sent with the registration */
	connectorProperties?: Record<string, string>;
	logger?: Logger;
}

export interface RegistrationResult {
	status: ConnectorStatus;
	attempts: number;
	elapsed: number;
}

export class ConnectorLifecycleClient {
	private currentState: RegistrationState = "not-registered";
	private readonly timeout: number;
	private readonly pollInterval: number;
	private readonly connectorProperties: Record<string, string>;
	private readonly logger: Logger;

	constructor(
		private readonly api: RemoteConnectorApi,
		options: ConnectorLifecycleClientOptions = {},
	) {
		this.timeout = options.timeout ?? DEFAULT_REGISTRATION_TIMEOUT;
		this.pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL;
		this.connectorProperties = options.connectorProperties ?? {};
		this.logger = options.logger ?? silentLogger;
	}

	get state(): RegistrationState {
		return this.currentState;
	}

	async registerAndWaitUntilRunning(parameters: ConnectionParameters): Promise<RegistrationResult> {
		if (this.currentState !== "not-registered") {
			throw new OutboxHarnessError(`Registration already attempted (state: ${this.currentState})`);
		}

		const configuration = buildConnectorConfiguration(parameters, this.connectorProperties);

		this.currentState = "registering";
		this.logger.info(
			`Registering connector ${configuration.name} for ${parameters.hostname}:${parameters.port}/${parameters.databaseName}`,
		);
		try {
			await this.api.registerOutboxConnector(configuration);
		} catch (error) {
			this.currentState = "registration-failed";
			this.logger.error(`Registration of ${configuration.name} failed: ${describeError(error)}`);
			if (error instanceof RegistrationError) {
				throw error;
			}
			throw new RegistrationError(
				`Failed to register connector ${configuration.name}: ${describeError(error)}`,
				undefined,
				describeError(error),
				{ cause: error },
			);
		}

		this.currentState = "polling";
		const result = await pollUntil(
			() => this.api.outboxConnectorStatus(),
			(status) => status.isRunning(),
			{
				timeout: this.timeout,
				interval: this.pollInterval,
				onAttempt: (attempt) => this.logger.debug(`Poll #${attempt.attempt}: ${describeAttempt(attempt)}`),
			},
		);

		if (!result.satisfied) {
			this.currentState = "timed-out";
			const last = result.last;
			const lastState = last !== undefined && last.ok ? last.value.state : undefined;
			const lastSeen = last ? describeAttempt(last) : "no status received";
			this.logger.error(`Connector ${configuration.name} not running after ${result.elapsed}ms (${lastSeen})`);
			throw new TimeoutError(
				`Connector ${configuration.name} did not reach RUNNING within ${this.timeout}ms ` +
					`(elapsed ${result.elapsed}ms, ${result.attempts} polls, last: ${lastSeen})`,
				this.timeout,
				result.elapsed,
				lastState,
				last && !last.ok ? { cause: last.error } : undefined,
			);
		}

		this.currentState = "running";
		this.logger.info(`Connector ${configuration.name} running after ${result.elapsed}ms (${result.attempts} polls)`);
		return { status: result.value, attempts: result.attempts, elapsed: result.elapsed };
	}
}

function describeAttempt(attempt: PollAttempt<ConnectorStatus>): string {
	return attempt.ok ? `state ${attempt.value.state}` : `error ${describeError(attempt.error)}`;
}
