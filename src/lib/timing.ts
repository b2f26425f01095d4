import { WaitTimeoutError } from "./errors.js";

export interface Clock {
	now(): number;
	sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep: (ms) =>
		new Promise((resolve) => {
			setTimeout(resolve, Math.max(0, ms));
		}),
};

export type WaitCondition<T> = () => Promise<T | null | undefined | false>;

export interface PollOptions {
	timeoutMs: number;
	intervalMs?: number;
	description?: string;
}

/**
 * Re-evaluates `condition` until it yields a truthy value or the deadline
 * passes. The condition always runs at least once, even with a zero timeout.
 * A rejected evaluation counts as "not yet"; the last rejection becomes the
 * `cause` of the timeout.
 */
export async function pollUntil<T>(
	clock: Clock,
	condition: WaitCondition<T>,
	options: PollOptions,
): Promise<T> {
	const intervalMs = options.intervalMs ?? 200;
	const deadline = clock.now() + options.timeoutMs;

	let lastError: unknown;

	for (;;) {
		try {
			const value = await condition();
			if (value !== null && value !== undefined && value !== false) {
				return value;
			}
		} catch (error) {
			lastError = error;
		}
		if (clock.now() >= deadline) {
			throw new WaitTimeoutError(
				options.timeoutMs,
				options.description,
				lastError === undefined ? undefined : { cause: lastError },
			);
		}
		await clock.sleep(Math.min(intervalMs, Math.max(0, deadline - clock.now())));
	}
}
