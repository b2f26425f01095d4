import type {
	ExtractionRequest,
	ExtractionResult,
	ExtractionTunables,
	ListKind,
	SessionState,
} from "../lib/types.js";

export interface ListOptions {
	maxDurationMs?: number;
}

/** What the CLI handlers need from an authenticated session. */
export interface RelationshipClient {
	readonly state: SessionState;
	readonly tunables: Readonly<ExtractionTunables>;

	getFollowers(profile: string, options?: ListOptions): Promise<string[]>;
	getFollowing(profile: string, options?: ListOptions): Promise<string[]>;
	getTotalCount(profile: string, kind: ListKind): Promise<number | null>;
	extract(
		request: ExtractionRequest,
		tunables?: Partial<ExtractionTunables>,
	): Promise<ExtractionResult>;

	setTunables(tunables: Partial<ExtractionTunables>): void;
	close(): Promise<void>;
}
