/**
 * Vitest Binding
 *
 * Registers the outbox connector before every test of the enclosing
 * suite (or file) through Vitest's `beforeEach`.
 */

import type { OutboxConnectorCallbackOptions } from "outbox-harness";
import {
	DEFAULT_REGISTRATION_TIMEOUT,
	DEFAULT_REQUEST_TIMEOUT,
	InitOutboxConnectorBeforeEachCallback,
} from "outbox-harness";
import { afterEach, beforeEach } from "vitest";

/** Slack on top of the request budget, so the harness reports its own TimeoutError first */
const HOOK_TIMEOUT_SLACK = 1000;

export interface UseOutboxConnectorOptions extends OutboxConnectorCallbackOptions {
	/** Vitest hook timeout (default: timeout + 2 * requestTimeout + 1s) */
	hookTimeout?: number;
	/** Remove the connector after each test (default: false) */
	cleanup?: boolean;
}

/**
 * Hook timeout covering the registration request, the polling deadline
 * and one status request in flight at the deadline
 */
export function resolveHookTimeout(options: UseOutboxConnectorOptions = {}): number {
	if (options.hookTimeout !== undefined) {
		return options.hookTimeout;
	}
	const timeout = options.timeout ?? DEFAULT_REGISTRATION_TIMEOUT;
	const requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
	return timeout + 2 * requestTimeout + HOOK_TIMEOUT_SLACK;
}

/**
 * @example
 * ```typescript
 * describe("order service", () => {
 *   useOutboxConnector({ cleanup: true });
 *
 *   it("publishes OrderCreated", async () => {
 *     // connector is running here
 *   });
 * });
 * ```
 */
export function useOutboxConnector(options: UseOutboxConnectorOptions = {}): InitOutboxConnectorBeforeEachCallback {
	const { hookTimeout: _hookTimeout, cleanup, ...callbackOptions } = options;
	const callback = new InitOutboxConnectorBeforeEachCallback(callbackOptions);
	const timeout = resolveHookTimeout(options);

	beforeEach(async (context) => {
		await callback.beforeEach(context);
	}, timeout);

	if (cleanup) {
		afterEach(async (context) => {
			await callback.afterEach(context);
		}, timeout);
	}

	return callback;
}
