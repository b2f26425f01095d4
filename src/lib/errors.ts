export type LoginFailureReason =
	| "DriverInitFailed"
	| "NavigationFailed"
	| "FormNotFound"
	| "CredentialEntryFailed"
	| "NoLoginControlFound"
	| "FallbackTimeout"
	| "CheckpointRequired"
	| "LoginNotConfirmed"
	| "UnexpectedDriverFailure";

export abstract class HarvestError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Fatal failure of the login flow. No session is usable after it; the
 * driver has already been released when it reaches the caller.
 */
export class LoginError extends HarvestError {
	readonly reason: LoginFailureReason;

	constructor(
		reason: LoginFailureReason,
		message: string,
		options?: ErrorOptions,
	) {
		super(`Login failed (${reason}): ${message}`, options);
		this.reason = reason;
	}
}

export class ParseError extends HarvestError {
	readonly input: string | null | undefined;

	constructor(input: string | null | undefined, message: string) {
		super(message);
		this.input = input;
	}
}

export class ConfigurationError extends HarvestError {
	readonly key?: string;
	readonly file?: string;

	constructor(
		message: string,
		details: { key?: string; file?: string } = {},
		options?: ErrorOptions,
	) {
		super(message, options);
		this.key = details.key;
		this.file = details.file;
	}
}

export class SessionClosedError extends HarvestError {
	constructor(operation: string) {
		super(`Cannot run ${operation}: the session is closed.`);
	}
}

export class WaitTimeoutError extends HarvestError {
	readonly timeoutMs: number;

	constructor(timeoutMs: number, description = "condition", options?: ErrorOptions) {
		super(`Timed out after ${timeoutMs}ms waiting for ${description}.`, options);
		this.timeoutMs = timeoutMs;
	}
}

export function formatError(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
