import type { Locator } from "playwright";
import type { AutomationDriver, DriverLauncher } from "../browser/driver.js";
import {
	DEFAULT_TUNABLES,
	ListExtractionEngine,
	resolveTunables,
} from "../browser/list-extractor.js";
import { LoginFlow, type LoginFlowOptions } from "../browser/login-flow.js";
import { launchPlaywrightDriver } from "../browser/playwright-driver.js";
import {
	ConfigurationError,
	LoginError,
	SessionClosedError,
	formatError,
} from "../lib/errors.js";
import { DEFAULT_BASE_URL, normalizeBaseUrl, normalizeProfileId } from "../lib/identifiers.js";
import { type Logger, silentLogger } from "../lib/logger.js";
import { SelectorStore } from "../lib/selectors.js";
import { type Clock, systemClock } from "../lib/timing.js";
import type {
	Credentials,
	ExtractionRequest,
	ExtractionResult,
	ExtractionTunables,
	ListKind,
	SessionState,
} from "../lib/types.js";
import type { ListOptions, RelationshipClient } from "./client.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface SessionOptions {
	headless?: boolean;
	timeoutMs?: number;
	baseUrl?: string;
	selectors?: SelectorStore;
	tunables?: Partial<ExtractionTunables>;
	logger?: Logger;
	clock?: Clock;
	/** Delays of the optional login prompts. */
	loginTiming?: Pick<
		LoginFlowOptions,
		"interstitialTimeoutMs" | "clickDelayMs" | "settleDelayMs"
	>;
}

interface SessionSettings {
	baseUrl: string;
	timeoutMs: number;
	selectors: SelectorStore;
	logger: Logger;
	clock: Clock;
	loginTiming: SessionOptions["loginTiming"];
}

/**
 * One signed-in browser. Owns its driver from `open()` until `close()`;
 * every operation after `close()` rejects with {@link SessionClosedError}.
 */
export class Session<THandle> implements RelationshipClient {
	private currentState: SessionState = "Unauthenticated";
	private currentTunables: Readonly<ExtractionTunables>;
	private credentials: Credentials | null;
	private readonly extractor: ListExtractionEngine<THandle>;

	private constructor(
		private readonly driver: AutomationDriver<THandle>,
		credentials: Credentials,
		tunables: Readonly<ExtractionTunables>,
		private readonly settings: SessionSettings,
	) {
		this.credentials = credentials;
		this.currentTunables = tunables;
		this.extractor = new ListExtractionEngine(
			driver,
			settings.selectors,
			{ baseUrl: settings.baseUrl, timeoutMs: settings.timeoutMs },
			{ logger: settings.logger, clock: settings.clock },
		);
	}

	static async open<THandle>(
		credentials: Credentials,
		options: SessionOptions,
		launcher: DriverLauncher<THandle>,
	): Promise<Session<THandle>> {
		if (!credentials.identifier.trim() || !credentials.secret) {
			throw new ConfigurationError(
				"Both a username and a password are required to sign in.",
				{ key: credentials.identifier.trim() ? "password" : "username" },
			);
		}

		const logger = options.logger ?? silentLogger;
		const settings: SessionSettings = {
			baseUrl: normalizeBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL),
			timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			selectors: options.selectors ?? SelectorStore.load(),
			logger,
			clock: options.clock ?? systemClock,
			loginTiming: options.loginTiming,
		};
		const tunables = resolveTunables(DEFAULT_TUNABLES, options.tunables);
		const headless = options.headless ?? true;

		let driver: AutomationDriver<THandle>;
		try {
			driver = await launcher({ headless, timeoutMs: settings.timeoutMs });
		} catch (error) {
			throw new LoginError(
				"DriverInitFailed",
				`could not start the browser: ${formatError(error)}`,
				{ cause: error },
			);
		}
		logger.debug("Browser started", { headless, baseUrl: settings.baseUrl });

		const session = new Session(driver, { ...credentials }, tunables, settings);
		try {
			await session.authenticate();
		} catch (error) {
			await session.close().catch((closeError: unknown) => {
				logger.warn("Browser did not close cleanly", { error: formatError(closeError) });
			});
			throw error;
		}
		return session;
	}

	get state(): SessionState {
		return this.currentState;
	}

	get tunables(): Readonly<ExtractionTunables> {
		return this.currentTunables;
	}

	setTunables(tunables: Partial<ExtractionTunables>): void {
		this.assertOpen("setTunables");
		this.currentTunables = resolveTunables(this.currentTunables, tunables);
	}

	async getFollowers(profile: string, options: ListOptions = {}): Promise<string[]> {
		this.assertOpen("getFollowers");
		const result = await this.extract({
			profile,
			kind: "followers",
			maxDurationMs: options.maxDurationMs,
		});
		return result.handles;
	}

	async getFollowing(profile: string, options: ListOptions = {}): Promise<string[]> {
		this.assertOpen("getFollowing");
		const result = await this.extract({
			profile,
			kind: "following",
			maxDurationMs: options.maxDurationMs,
		});
		return result.handles;
	}

	async getTotalCount(profile: string, kind: ListKind): Promise<number | null> {
		this.assertOpen("getTotalCount");
		return this.extractor.totalCount(normalizeProfileId(profile), kind);
	}

	async extract(
		request: ExtractionRequest,
		tunables?: Partial<ExtractionTunables>,
	): Promise<ExtractionResult> {
		this.assertOpen("extract");
		const effective = tunables
			? resolveTunables(this.currentTunables, tunables)
			: this.currentTunables;

		return this.extractor.extract(
			{ ...request, profile: normalizeProfileId(request.profile) },
			effective,
		);
	}

	async close(): Promise<void> {
		if (this.currentState === "Closed") return;
		this.currentState = "Closed";
		this.credentials = null;
		await this.driver.close();
		this.settings.logger.debug("Session closed");
	}

	private async authenticate(): Promise<void> {
		const credentials = this.credentials;
		if (!credentials) throw new SessionClosedError("authenticate");

		const flow = new LoginFlow(
			this.driver,
			this.settings.selectors,
			credentials,
			{
				baseUrl: this.settings.baseUrl,
				timeoutMs: this.settings.timeoutMs,
				...this.settings.loginTiming,
			},
			{ logger: this.settings.logger, clock: this.settings.clock },
		);
		await flow.run();
		this.currentState = "Authenticated";
	}

	private assertOpen(operation: string): void {
		if (this.currentState === "Closed") throw new SessionClosedError(operation);
	}
}

export function openSession(
	credentials: Credentials,
	options: SessionOptions = {},
): Promise<Session<Locator>> {
	return Session.open(credentials, options, launchPlaywrightDriver);
}

/** Opens a session, runs `task`, and closes the session whatever the outcome. */
export async function withSession<T>(
	credentials: Credentials,
	options: SessionOptions,
	task: (session: RelationshipClient) => Promise<T>,
	launcher: DriverLauncher<unknown> = launchPlaywrightDriver,
): Promise<T> {
	const session = await Session.open(credentials, options, launcher);
	try {
		return await task(session);
	} finally {
		await session.close();
	}
}
