/**
 * Harness Logger
 *
 * Prefixed console output, in the same shape as the global setup logs
 * ("[Outbox Connector] Registering ...").
 */

export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
	/** Print debug messages (default: OUTBOX_HARNESS_DEBUG === "true") */
	debug?: boolean;
}

/**
 * Create a logger writing to the console with a `[prefix]` tag
 */
export function createConsoleLogger(prefix: string, options: ConsoleLoggerOptions = {}): Logger {
	const debugEnabled = options.debug ?? process.env.OUTBOX_HARNESS_DEBUG === "true";
	const tag = `[${prefix}]`;

	return {
		debug(message, ...args) {
			if (debugEnabled) {
				console.debug(`${tag} ${message}`, ...args);
			}
		},
		info(message, ...args) {
			console.log(`${tag} ${message}`, ...args);
		},
		warn(message, ...args) {
			console.warn(`${tag} ${message}`, ...args);
		},
		error(message, ...args) {
			console.error(`${tag} ${message}`, ...args);
		},
	};
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
