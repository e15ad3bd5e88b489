/**
 * Harness Errors
 *
 * Every failure raised by the harness is fatal to the current test.
 * The only condition retried is a failed status poll, and only until
 * the registration deadline.
 */

/**
 * Base class for all harness errors
 */
export class OutboxHarnessError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "OutboxHarnessError";
	}
}

/**
 * A required configuration value is missing or malformed
 */
export class ConfigurationError extends OutboxHarnessError {
	constructor(
		message: string,
		public readonly key?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

/**
 * The management API rejected (or never received) the registration request
 */
export class RegistrationError extends OutboxHarnessError {
	constructor(
		message: string,
		public readonly status?: number,
		public readonly detail?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "RegistrationError";
	}
}

/**
 * A status or removal call failed at transport or HTTP level,
 * or returned a body that is not a connector status.
 */
export class ConnectorApiError extends OutboxHarnessError {
	constructor(
		message: string,
		public readonly status?: number,
		public readonly detail?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConnectorApiError";
	}
}

/**
 * The connector did not report RUNNING before the deadline
 */
export class TimeoutError extends OutboxHarnessError {
	constructor(
		message: string,
		public readonly timeout: number,
		public readonly elapsed: number,
		public readonly lastState?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "TimeoutError";
	}
}
