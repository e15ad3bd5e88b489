/**
 * HTTP Remote Connector API
 *
 * Kafka Connect REST client for the three calls the harness needs:
 * - POST   /connectors
 * - GET    /connectors/{name}/status
 * - DELETE /connectors/{name}
 */

import { ZodError } from "zod";
import type { ConnectorConfiguration } from "../connector";
import { CONNECTOR_NAME, ConnectorStatus, toRegistrationBody } from "../connector";
import { ConnectorApiError, RegistrationError } from "../errors";
import { describeError } from "../utils";
import type { HttpRemoteConnectorApiOptions, RemoteConnectorApi } from "./remote-api.types";

export const DEFAULT_CONNECT_URL = "http://localhost:8083";
export const DEFAULT_REQUEST_TIMEOUT = 5000;

export class HttpRemoteConnectorApi implements RemoteConnectorApi {
	readonly baseUrl: string;
	readonly connectorName: string;
	private readonly requestTimeout: number;
	private readonly headers: Record<string, string>;

	constructor(options: HttpRemoteConnectorApiOptions = {}) {
		this.baseUrl = (options.baseUrl ?? DEFAULT_CONNECT_URL).replace(/\/+$/, "");
		this.connectorName = options.connectorName ?? CONNECTOR_NAME;
		this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
		this.headers = options.headers ?? {};
	}

	async registerOutboxConnector(configuration: ConnectorConfiguration): Promise<void> {
		const url = `${this.baseUrl}/connectors`;
		let response: Response;
		try {
			response = await this.send(url, {
				method: "POST",
				body: JSON.stringify(toRegistrationBody(configuration)),
			});
		} catch (error) {
			throw new RegistrationError(
				`Failed to register connector ${configuration.name} at ${url}: ${describeError(error)}`,
				undefined,
				undefined,
				{ cause: error },
			);
		}

		if (!response.ok) {
			const detail = await readErrorDetail(response);
			throw new RegistrationError(
				`Failed to register connector ${configuration.name}: ${response.status} ${response.statusText} - ${detail}`,
				response.status,
				detail,
			);
		}
	}

	async outboxConnectorStatus(): Promise<ConnectorStatus> {
		const url = `${this.baseUrl}/connectors/${encodeURIComponent(this.connectorName)}/status`;
		const response = await this.request(url, { method: "GET" });

		if (!response.ok) {
			const detail = await readErrorDetail(response);
			throw new ConnectorApiError(
				`Status request failed: ${response.status} ${response.statusText} - ${detail}`,
				response.status,
				detail,
			);
		}

		try {
			return ConnectorStatus.parse(await response.json());
		} catch (error) {
			const reason = error instanceof ZodError ? "unexpected status body" : describeError(error);
			throw new ConnectorApiError(`Invalid status response from ${url}: ${reason}`, response.status, undefined, {
				cause: error,
			});
		}
	}

	async removeOutboxConnector(): Promise<void> {
		const url = `${this.baseUrl}/connectors/${encodeURIComponent(this.connectorName)}`;
		const response = await this.request(url, { method: "DELETE" });

		if (!response.ok && response.status !== 404) {
			const detail = await readErrorDetail(response);
			throw new ConnectorApiError(
				`Failed to remove connector ${this.connectorName}: ${response.status} ${response.statusText} - ${detail}`,
				response.status,
				detail,
			);
		}
	}

	/**
	 * Send a request, turning transport failures into ConnectorApiError
	 */
	private async request(url: string, init: RequestInit): Promise<Response> {
		try {
			return await this.send(url, init);
		} catch (error) {
			throw new ConnectorApiError(`${init.method} ${url} failed: ${describeError(error)}`, undefined, undefined, {
				cause: error,
			});
		}
	}

	private send(url: string, init: RequestInit): Promise<Response> {
		return fetch(url, {
			...init,
			headers: {
				Accept: "application/json",
				"Content-Type": "application/json",
				...this.headers,
			},
			signal: AbortSignal.timeout(this.requestTimeout),
		});
	}
}

/**
 * Kafka Connect error bodies look like `{ "error_code": 409, "message": "..." }`
 */
async function readErrorDetail(response: Response): Promise<string> {
	const text = await response.text().catch((error: unknown) => `<unreadable body: ${describeError(error)}>`);
	const body = parseJson(text);
	if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
		return body.message;
	}
	return text;
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}
