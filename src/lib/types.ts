export type ListKind = "followers" | "following";

export interface Credentials {
	identifier: string;
	secret: string;
}

export type SessionState = "Unauthenticated" | "Authenticated" | "Closed";

export interface ExtractionTunables {
	/** Surface reopen budget once scrolling stops producing handles. */
	maxRefreshAttempts: number;
	waitIntervalMs: number;
	/** Extra scroll+read cycles of the settle phase. */
	additionalScrollAttempts: number;
	pauseTimeMs: number;
	/** Consecutive no-growth iterations before the settle phase. */
	maxAttempts: number;
}

export interface GlobalOptions {
	username?: string;
	password?: string;
	baseUrl?: string;
	selectorsFile?: string;
	timeout?: number;
	headless: boolean;
	plain?: boolean;
	color?: boolean;
	verbose?: boolean;
	tunables: Partial<ExtractionTunables>;
}

export interface ExtractionRequest {
	profile: string;
	kind: ListKind;
	maxDurationMs?: number;
	expectedCount?: number;
}

export type StopReason = "complete" | "converged" | "deadline" | "unavailable";

export interface ExtractionResult {
	profile: string;
	kind: ListKind;
	handles: string[];
	expectedCount: number | null;
	stopReason: StopReason;
	iterations: number;
	refreshes: number;
	elapsedMs: number;
}

export interface ExtractionOptions {
	maxDurationMs?: number;
	tunables: Partial<ExtractionTunables>;
}

export interface CountResult {
	profile: string;
	kind: ListKind;
	count: number | null;
}

export interface SessionStatus {
	state: SessionState;
	baseUrl: string;
}

export interface JsonOutputOptions {
	json: boolean;
	jsonFull: boolean;
}
