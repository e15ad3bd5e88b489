/**
 * Fake Kafka Connect Server
 *
 * In-process stand-in for the Kafka Connect REST API, built on node:http.
 * Serves the three endpoints the harness calls and records every request.
 */

import * as http from "node:http";

export interface RecordedRequest {
	method: string;
	path: string;
	body: unknown;
}

export interface FakeConnectServerOptions {
	/** States reported by successive status calls; the last one repeats (default: ["RUNNING"]) */
	states?: string[];
	/** Answer POST /connectors with this status code and error message instead of 201 */
	registrationError?: { code: number; message: string };
	/** Status calls answered with 503 before states are served */
	unavailablePolls?: number;
}

interface Connector {
	name: string;
	config: Record<string, string>;
}

export class FakeConnectServer {
	readonly requests: RecordedRequest[] = [];
	private server: http.Server | null = null;
	private connectors = new Map<string, Connector>();
	private statusCalls = 0;

	constructor(private options: FakeConnectServerOptions = {}) {}

	get url(): string {
		const address = this.server?.address();
		if (!address || typeof address === "string") {
			throw new Error("FakeConnectServer: not started");
		}
		return `http://127.0.0.1:${address.port}`;
	}

	get registered(): ReadonlyMap<string, Connector> {
		return this.connectors;
	}

	configure(options: FakeConnectServerOptions): void {
		this.options = options;
		this.statusCalls = 0;
	}

	async start(): Promise<void> {
		const server = http.createServer((req, res) => {
			this.handle(req, res).catch((error: unknown) => {
				this.send(res, 500, { error_code: 500, message: String(error) });
			});
		});
		await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
		this.server = server;
	}

	async stop(): Promise<void> {
		const server = this.server;
		if (!server) {
			return;
		}
		this.server = null;
		await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
	}

	private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		const method = req.method ?? "GET";
		const path = req.url ?? "/";
		const body = await readBody(req);
		this.requests.push({ method, path, body });

		if (method === "POST" && path === "/connectors") {
			this.register(body, res);
			return;
		}

		const match = /^\/connectors\/([^/]+)(\/status)?$/.exec(path);
		if (!match) {
			this.send(res, 404, { error_code: 404, message: `Unknown path ${path}` });
			return;
		}

		const name = decodeURIComponent(match[1]);
		const connector = this.connectors.get(name);

		if (method === "GET" && match[2]) {
			this.status(name, connector, res);
			return;
		}

		if (method === "DELETE" && !match[2]) {
			if (!connector) {
				this.send(res, 404, { error_code: 404, message: `Connector ${name} not found` });
				return;
			}
			this.connectors.delete(name);
			res.writeHead(204).end();
			return;
		}

		this.send(res, 405, { error_code: 405, message: `${method} not allowed` });
	}

	private register(body: unknown, res: http.ServerResponse): void {
		if (this.options.registrationError) {
			const { code, message } = this.options.registrationError;
			this.send(res, code, { error_code: code, message });
			return;
		}
		if (!isConnector(body)) {
			this.send(res, 400, { error_code: 400, message: "Invalid connector body" });
			return;
		}
		if (this.connectors.has(body.name)) {
			this.send(res, 409, { error_code: 409, message: `Connector ${body.name} already exists` });
			return;
		}
		this.connectors.set(body.name, body);
		this.send(res, 201, { ...body, tasks: [], type: "source" });
	}

	private status(name: string, connector: Connector | undefined, res: http.ServerResponse): void {
		if (!connector) {
			this.send(res, 404, { error_code: 404, message: `No status found for connector ${name}` });
			return;
		}

		const call = this.statusCalls++;
		const unavailable = this.options.unavailablePolls ?? 0;
		if (call < unavailable) {
			this.send(res, 503, { error_code: 503, message: "Service unavailable" });
			return;
		}

		const states = this.options.states ?? ["RUNNING"];
		const state = states[Math.min(call - unavailable, states.length - 1)];
		this.send(res, 200, {
			name,
			connector: { state, worker_id: "127.0.0.1:8083" },
			tasks: state === "RUNNING" ? [{ id: 0, state, worker_id: "127.0.0.1:8083" }] : [],
			type: "source",
		});
	}

	private send(res: http.ServerResponse, code: number, body: unknown): void {
		res.writeHead(code, { "Content-Type": "application/json" });
		res.end(JSON.stringify(body));
	}
}

function isConnector(body: unknown): body is Connector {
	return (
		typeof body === "object" &&
		body !== null &&
		"name" in body &&
		typeof body.name === "string" &&
		"config" in body &&
		typeof body.config === "object" &&
		body.config !== null
	);
}

function readBody(req: http.IncomingMessage): Promise<unknown> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		req.on("data", (chunk: Buffer) => chunks.push(chunk));
		req.on("end", () => {
			if (chunks.length === 0) {
				resolve(undefined);
				return;
			}
			const text = Buffer.concat(chunks).toString("utf-8");
			try {
				resolve(JSON.parse(text));
			} catch {
				resolve(text);
			}
		});
		req.on("error", reject);
	});
}
