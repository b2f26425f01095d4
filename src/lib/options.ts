import { ConfigurationError } from "./errors.js";
import type {
	Credentials,
	ExtractionOptions,
	ExtractionTunables,
	GlobalOptions,
	JsonOutputOptions,
	ListKind,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseOptionalString(value: unknown): string | undefined {
	if (value === undefined || value === null) return undefined;
	const text = String(value).trim();
	return text || undefined;
}

function parseOptionalPositiveInt(value: unknown): number | undefined {
	if (value === undefined || value === null || value === "") return undefined;
	const numeric =
		typeof value === "number" ? value : Number.parseInt(String(value), 10);
	if (!Number.isFinite(numeric) || numeric <= 0) return undefined;
	return numeric;
}

function parseCount(value: unknown, label: string): number | undefined {
	if (value === undefined || value === null || value === "") return undefined;
	const numeric = typeof value === "number" ? value : Number(String(value).trim());
	if (!Number.isInteger(numeric) || numeric < 0) {
		throw new ConfigurationError(`${label} must be a non-negative integer.`, {
			key: label,
		});
	}
	return numeric;
}

function parseTunables(raw: Record<string, unknown>): Partial<ExtractionTunables> {
	return {
		maxRefreshAttempts: parseCount(raw.maxRefreshAttempts, "maxRefreshAttempts"),
		waitIntervalMs: parseCount(raw.waitIntervalMs, "waitIntervalMs"),
		additionalScrollAttempts: parseCount(
			raw.additionalScrollAttempts,
			"additionalScrollAttempts",
		),
		pauseTimeMs: parseCount(raw.pauseTimeMs, "pauseTimeMs"),
		maxAttempts: parseCount(raw.maxAttempts, "maxAttempts"),
	};
}

/** Later layers win; `undefined` never overrides a set value. */
export function mergeTunables(
	...layers: Partial<ExtractionTunables>[]
): Partial<ExtractionTunables> {
	const merged: Partial<ExtractionTunables> = {};
	for (const layer of layers) {
		for (const [key, value] of Object.entries(layer)) {
			if (value === undefined) continue;
			if (
				key === "maxRefreshAttempts" ||
				key === "waitIntervalMs" ||
				key === "additionalScrollAttempts" ||
				key === "pauseTimeMs" ||
				key === "maxAttempts"
			) {
				merged[key] = value;
			}
		}
	}
	return merged;
}

export function parseGlobalOptions(raw: Record<string, unknown>): GlobalOptions {
	return {
		username: parseOptionalString(raw.username),
		password: raw.password ? String(raw.password) : undefined,
		baseUrl: parseOptionalString(raw.baseUrl),
		selectorsFile: parseOptionalString(raw.selectors),
		timeout: parseOptionalPositiveInt(raw.timeout),
		headless: raw.headless === undefined ? true : Boolean(raw.headless),
		plain: Boolean(raw.plain),
		color: raw.color === undefined ? true : Boolean(raw.color),
		verbose: Boolean(raw.verbose),
		tunables: mergeTunables(parseTunables(isRecord(raw.tunables) ? raw.tunables : {})),
	};
}

export function parseExtractionOptions(raw: Record<string, unknown>): ExtractionOptions {
	return {
		maxDurationMs: parseOptionalPositiveInt(raw.maxDuration),
		tunables: mergeTunables({
			maxRefreshAttempts: parseCount(raw.maxRefreshAttempts, "--max-refresh-attempts"),
			waitIntervalMs: parseCount(raw.waitInterval, "--wait-interval"),
			additionalScrollAttempts: parseCount(raw.additionalScrolls, "--additional-scrolls"),
			pauseTimeMs: parseCount(raw.pause, "--pause"),
			maxAttempts: parseCount(raw.maxAttempts, "--max-attempts"),
		}),
	};
}

export function parseListKind(value: unknown): ListKind {
	const kind = String(value ?? "followers").trim().toLowerCase();
	if (kind === "followers" || kind === "following") return kind;
	throw new ConfigurationError(
		`Invalid list kind "${kind}". Allowed: followers, following.`,
		{ key: "kind" },
	);
}

export function parseJsonFlag(raw: Record<string, unknown>): JsonOutputOptions {
	const jsonFull = Boolean(raw.jsonFull);
	return {
		json: Boolean(raw.json) || jsonFull,
		jsonFull,
	};
}

export function requireCredentials(options: GlobalOptions): Credentials {
	if (!options.username || !options.password) {
		throw new ConfigurationError(
			"Missing credentials: pass --username and --password, or set LISTHARVEST_USERNAME and LISTHARVEST_PASSWORD.",
			{ key: options.username ? "password" : "username" },
		);
	}
	return { identifier: options.username, secret: options.password };
}
