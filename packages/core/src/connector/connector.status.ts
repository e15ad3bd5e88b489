/**
 * Connector Status
 *
 * Read-only view of `GET /connectors/{name}/status`.
 */

import { z } from "zod";
import type { ConnectorState } from "./connector.types";

const RUNNING_STATE = "RUNNING";

const stateSchema = z.object({
	state: z.string(),
	worker_id: z.string().optional(),
});

export const connectorStatusSchema = z.object({
	name: z.string(),
	connector: stateSchema,
	tasks: z.array(stateSchema.extend({ id: z.number(), trace: z.string().optional() })).optional(),
	type: z.string().optional(),
});

export type ConnectorStatusBody = z.infer<typeof connectorStatusSchema>;

export interface ConnectorStateInfo {
	readonly state: ConnectorState;
	readonly workerId?: string;
}

export interface TaskStateInfo extends ConnectorStateInfo {
	readonly id: number;
	readonly trace?: string;
}

export class ConnectorStatus {
	readonly tasks: readonly TaskStateInfo[];

	constructor(
		readonly name: string,
		readonly connectorState: ConnectorStateInfo,
		tasks: TaskStateInfo[] = [],
		readonly type?: string,
	) {
		this.tasks = Object.freeze([...tasks]);
		Object.freeze(this);
	}

	/**
	 * Parse a response body; throws ZodError when `name` or `connector.state` is missing
	 */
	static parse(body: unknown): ConnectorStatus {
		const parsed = connectorStatusSchema.parse(body);
		return new ConnectorStatus(
			parsed.name,
			{ state: parsed.connector.state, workerId: parsed.connector.worker_id },
			(parsed.tasks ?? []).map((task) => ({
				id: task.id,
				state: task.state,
				workerId: task.worker_id,
				trace: task.trace,
			})),
			parsed.type,
		);
	}

	get state(): ConnectorState {
		return this.connectorState.state;
	}

	isRunning(): boolean {
		return this.connectorState.state === RUNNING_STATE;
	}
}
