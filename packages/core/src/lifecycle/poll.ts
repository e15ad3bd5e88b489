/**
 * Bounded Polling
 *
 * Calls `poll` until `isDone` accepts a value or the timeout elapses.
 * The next attempt is scheduled only after the previous one settled.
 * A rejected attempt counts as "not done yet"; an attempt still pending
 * at the deadline is abandoned and counts as rejected.
 */

import { OutboxHarnessError } from "../errors";
import { sleep } from "../utils";

export interface PollOptions<T> {
	/** Overall deadline in milliseconds, measured from the first attempt */
	timeout: number;
	/** Delay between attempts in milliseconds */
	interval: number;
	/** Called after every unsuccessful attempt */
	onAttempt?: (attempt: PollAttempt<T>) => void;
}

export type PollAttempt<T> =
	| { attempt: number; elapsed: number; ok: true; value: T }
	| { attempt: number; elapsed: number; ok: false; error: unknown };

export type PollResult<T> =
	| { satisfied: true; value: T; attempts: number; elapsed: number }
	| { satisfied: false; attempts: number; elapsed: number; last?: PollAttempt<T> };

export async function pollUntil<T>(
	poll: () => Promise<T>,
	isDone: (value: T) => boolean,
	options: PollOptions<T>,
): Promise<PollResult<T>> {
	const startedAt = Date.now();
	let attempts = 0;
	let last: PollAttempt<T> | undefined;

	for (;;) {
		attempts++;
		try {
			const value = await settleBefore(poll(), options.timeout - (Date.now() - startedAt), attempts);
			if (isDone(value)) {
				return { satisfied: true, value, attempts, elapsed: Date.now() - startedAt };
			}
			last = { attempt: attempts, elapsed: Date.now() - startedAt, ok: true, value };
		} catch (error) {
			last = { attempt: attempts, elapsed: Date.now() - startedAt, ok: false, error };
		}
		options.onAttempt?.(last);

		const elapsed = Date.now() - startedAt;
		if (elapsed >= options.timeout) {
			return { satisfied: false, attempts, elapsed, last };
		}
		await sleep(Math.min(options.interval, options.timeout - elapsed));
	}
}

/**
 * Reject when `attempt` has not settled within `remaining` milliseconds
 */
function settleBefore<T>(attempt: Promise<T>, remaining: number, attemptNumber: number): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(new OutboxHarnessError(`Attempt ${attemptNumber} still pending at the deadline`));
		}, Math.max(remaining, 0));
	});
	return Promise.race([attempt, deadline]).finally(() => clearTimeout(timer));
}
