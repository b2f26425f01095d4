import { extractCountText, parseCountText } from "../lib/count-text.js";
import { ConfigurationError, ParseError, formatError } from "../lib/errors.js";
import { asProfileUrl, listLinkSelectorName } from "../lib/identifiers.js";
import type { Logger } from "../lib/logger.js";
import type { SelectorStore } from "../lib/selectors.js";
import type { Clock } from "../lib/timing.js";
import type {
	ExtractionRequest,
	ExtractionResult,
	ExtractionTunables,
	ListKind,
	StopReason,
} from "../lib/types.js";
import { type AutomationDriver, firstVisible } from "./driver.js";
import { ScrollState } from "./scroll-state.js";

export const DEFAULT_TUNABLES: Readonly<ExtractionTunables> = Object.freeze({
	maxRefreshAttempts: 100,
	waitIntervalMs: 500,
	additionalScrollAttempts: 1,
	pauseTimeMs: 500,
	maxAttempts: 2,
});

const TUNABLE_KEYS = [
	"maxRefreshAttempts",
	"waitIntervalMs",
	"additionalScrollAttempts",
	"pauseTimeMs",
	"maxAttempts",
] as const satisfies readonly (keyof ExtractionTunables)[];

const SCROLL_STEP = 2200;

/** Applies defined overrides on top of `base`; every value must be a non-negative integer. */
export function resolveTunables(
	base: Readonly<ExtractionTunables>,
	overrides: Partial<ExtractionTunables> = {},
): Readonly<ExtractionTunables> {
	const merged: ExtractionTunables = { ...base };
	for (const key of TUNABLE_KEYS) {
		const value = overrides[key];
		if (value === undefined) continue;
		if (!Number.isInteger(value) || value < 0) {
			throw new ConfigurationError(
				`Tunable "${key}" must be a non-negative integer, got ${value}.`,
				{ key },
			);
		}
		merged[key] = value;
	}
	return Object.freeze(merged);
}

export interface ListExtractorOptions {
	baseUrl: string;
	timeoutMs: number;
	/** Upper bound for waiting on the loading indicator during the settle phase. */
	loadingTimeoutMs?: number;
}

export interface ListExtractorDeps {
	logger: Logger;
	clock: Clock;
}

interface EntryPoint<THandle> {
	link: THandle;
	text: string;
}

interface OpenedSurface {
	expectedCount: number | null;
}

export class ListExtractionEngine<THandle> {
	private readonly loadingTimeoutMs: number;

	constructor(
		private readonly driver: AutomationDriver<THandle>,
		private readonly selectors: SelectorStore,
		private readonly options: ListExtractorOptions,
		private readonly deps: ListExtractorDeps,
	) {
		this.loadingTimeoutMs = options.loadingTimeoutMs ?? 10_000;
	}

	async extract(
		request: ExtractionRequest,
		tunables: Readonly<ExtractionTunables> = DEFAULT_TUNABLES,
	): Promise<ExtractionResult> {
		const { logger, clock } = this.deps;
		const state = new ScrollState(clock.now());
		const finish = (expectedCount: number | null, stopReason: StopReason): ExtractionResult => {
			const result: ExtractionResult = {
				profile: request.profile,
				kind: request.kind,
				handles: state.toArray(),
				expectedCount,
				stopReason,
				iterations: state.iterations,
				refreshes: state.refreshAttempts,
				elapsedMs: state.elapsed(clock.now()),
			};
			logger.info("Extraction finished", {
				profile: request.profile,
				kind: request.kind,
				collected: result.handles.length,
				expected: expectedCount,
				stopReason,
			});
			return result;
		};

		const opened = await this.openSurface(request.profile, request.kind);
		if (!opened) return finish(request.expectedCount ?? null, "unavailable");

		const expected = request.expectedCount ?? opened.expectedCount;
		const stopReason = await this.scrollUntilDone(state, request, tunables, expected);
		await this.closeSurface();
		return finish(expected, stopReason);
	}

	/**
	 * Reads the count shown on the profile's list entry point. Opens and
	 * closes the list surface without scrolling it.
	 */
	async totalCount(profile: string, kind: ListKind): Promise<number | null> {
		const entry = await this.findEntryPoint(profile, kind);
		if (!entry) return null;

		const count = parseCountText(extractCountText(entry.text) ?? entry.text);

		try {
			await this.driver.click(entry.link);
			await this.closeSurface();
		} catch (error) {
			this.deps.logger.debug("List surface could not be opened for counting", {
				error: formatError(error),
			});
		}
		return count;
	}

	private async scrollUntilDone(
		state: ScrollState,
		request: ExtractionRequest,
		tunables: Readonly<ExtractionTunables>,
		expected: number | null,
	): Promise<StopReason> {
		const { logger, clock } = this.deps;

		for (;;) {
			state.iterations += 1;
			state.recordGrowth(await this.collect(state));

			if (expected !== null && state.size >= expected) return "complete";

			if (state.noGrowthStreak >= tunables.maxAttempts) {
				const settled = await this.settle(state, tunables);
				state.noGrowthStreak = 0;
				if (expected !== null && state.size >= expected) return "complete";

				if (settled === 0) {
					if (state.refreshAttempts >= tunables.maxRefreshAttempts) {
						return "converged";
					}
					state.refreshAttempts += 1;
					logger.debug("List stopped growing, reopening", {
						refresh: state.refreshAttempts,
						collected: state.size,
					});
					if (!(await this.openSurface(request.profile, request.kind))) {
						return "unavailable";
					}
				}
			}

			await this.scrollForward();
			await clock.sleep(tunables.pauseTimeMs);

			if (state.deadlineExceeded(clock.now(), request.maxDurationMs)) {
				logger.debug("Extraction deadline reached", {
					maxDurationMs: request.maxDurationMs,
					collected: state.size,
				});
				return "deadline";
			}
		}
	}

	private async settle(
		state: ScrollState,
		tunables: Readonly<ExtractionTunables>,
	): Promise<number> {
		for (let attempt = 0; attempt < tunables.additionalScrollAttempts; attempt += 1) {
			await this.waitForLoading();
			await this.scrollForward();
			await this.deps.clock.sleep(tunables.waitIntervalMs);
			const added = await this.collect(state);
			if (added > 0) return added;
		}
		return 0;
	}

	private async openSurface(profile: string, kind: ListKind): Promise<OpenedSurface | null> {
		const entry = await this.findEntryPoint(profile, kind);
		if (!entry) return null;

		let expectedCount: number | null = null;
		const token = extractCountText(entry.text);
		if (token !== null) {
			try {
				expectedCount = parseCountText(token);
			} catch (error) {
				if (!(error instanceof ParseError)) throw error;
				this.deps.logger.debug("Entry point count is unreadable", { text: token });
			}
		}

		try {
			await this.driver.click(entry.link);
		} catch (error) {
			this.deps.logger.warn("List surface could not be opened", {
				profile,
				kind,
				error: formatError(error),
			});
			return null;
		}

		const itemLocator = this.selectors.get("PROFILE_USERNAME_SPAN");
		const containerLocator = this.selectors.get("LIST_CONTAINER");
		try {
			await this.driver.waitUntil(async () => {
				if ((await this.driver.find(containerLocator)).length > 0) return true;
				return (await this.driver.find(itemLocator)).length > 0;
			}, this.options.timeoutMs, "the list entries");
		} catch (error) {
			this.deps.logger.debug("List surface shows no entries yet", {
				error: formatError(error),
			});
		}

		return { expectedCount };
	}

	private async findEntryPoint(
		profile: string,
		kind: ListKind,
	): Promise<EntryPoint<THandle> | null> {
		const { logger } = this.deps;
		const url = asProfileUrl(profile, this.options.baseUrl);
		const linkLocator = this.selectors.get(listLinkSelectorName(kind));

		try {
			await this.driver.navigate(url);
		} catch (error) {
			logger.warn("Profile page could not be loaded", { url, error: formatError(error) });
			return null;
		}

		let link: THandle;
		try {
			link = await this.driver.waitUntil(
				() => firstVisible(this.driver, linkLocator),
				this.options.timeoutMs,
				`the ${kind} link`,
			);
		} catch (error) {
			logger.warn("List entry point not found", { profile, kind, error: formatError(error) });
			return null;
		}

		const text = await this.driver.readText(link).catch(() => "");
		return { link, text };
	}

	/** Adds the currently rendered handles and returns how many were new. */
	private async collect(state: ScrollState): Promise<number> {
		let handles: THandle[];
		try {
			handles = await this.driver.find(this.selectors.get("PROFILE_USERNAME_SPAN"));
		} catch (error) {
			this.deps.logger.debug("List items could not be read", { error: formatError(error) });
			return 0;
		}

		const texts: string[] = [];
		for (const handle of handles) {
			try {
				const text = (await this.driver.readText(handle)).trim();
				if (text) texts.push(text);
			} catch (error) {
				this.deps.logger.debug("Skipping unreadable list item", { error: formatError(error) });
			}
		}
		return state.add(texts);
	}

	private async waitForLoading(): Promise<void> {
		const spinner = this.selectors.get("LOADING_SPINNER");
		try {
			await this.driver.waitUntil(
				async () => (await this.driver.find(spinner)).length === 0,
				this.loadingTimeoutMs,
				"the loading indicator to clear",
			);
		} catch (error) {
			this.deps.logger.debug("Loading indicator still shown", { error: formatError(error) });
		}
	}

	private async scrollForward(): Promise<void> {
		try {
			const [container] = await this.driver.find(this.selectors.get("LIST_CONTAINER"));
			if (container !== undefined) {
				await this.driver.scroll(container, SCROLL_STEP);
				return;
			}
			const items = await this.driver.find(this.selectors.get("PROFILE_USERNAME_SPAN"));
			const last = items[items.length - 1];
			if (last !== undefined) await this.driver.scroll(last, SCROLL_STEP);
		} catch (error) {
			this.deps.logger.debug("Scroll failed", { error: formatError(error) });
		}
	}

	/** The dialog may render after the entry point click, so the close control is awaited. */
	private async closeSurface(): Promise<void> {
		const locator = this.selectors.get("CLOSE_MODAL_BUTTON");
		let button: THandle;
		try {
			button = await this.driver.waitUntil(
				async () => (await this.driver.find(locator))[0] ?? null,
				this.options.timeoutMs,
				"the list close button",
			);
		} catch (error) {
			this.deps.logger.debug("No close button on the list surface", {
				error: formatError(error),
			});
			return;
		}

		try {
			await this.driver.click(button);
		} catch (error) {
			this.deps.logger.debug("List surface could not be closed", { error: formatError(error) });
		}
	}
}
