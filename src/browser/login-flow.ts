import {
	ConfigurationError,
	LoginError,
	WaitTimeoutError,
	formatError,
} from "../lib/errors.js";
import { isLoginLocation, loginUrl } from "../lib/identifiers.js";
import { matchesKeyword } from "../lib/keywords.js";
import type { Logger } from "../lib/logger.js";
import type { SelectorStore } from "../lib/selectors.js";
import type { Clock } from "../lib/timing.js";
import type { Credentials } from "../lib/types.js";
import { type AutomationDriver, firstVisible } from "./driver.js";

export type LoginState =
	| "Start"
	| "FormLoaded"
	| "Submitted"
	| "Redirected"
	| "PostLoginCleanup"
	| "Ready";

export interface LoginFlowOptions {
	baseUrl: string;
	timeoutMs: number;
	/** Bounded wait for optional prompts (interstitial, save-login). */
	interstitialTimeoutMs?: number;
	clickDelayMs?: number;
	settleDelayMs?: number;
}

export interface LoginFlowDeps {
	logger: Logger;
	clock: Clock;
}

interface LoginFields<THandle> {
	identifier: THandle;
	secret: THandle;
}

const PAGE_TEXT_SCRIPT = "document.body ? document.body.innerText : ''";

/**
 * Drives the login page from a blank browser to an authenticated one.
 * Every state has a single handler that returns the next state; failures
 * leave the machine as a {@link LoginError}.
 */
export class LoginFlow<THandle> {
	private state: LoginState = "Start";
	private fields: LoginFields<THandle> | null = null;
	private readonly interstitialTimeoutMs: number;
	private readonly clickDelayMs: number;
	private readonly settleDelayMs: number;

	constructor(
		private readonly driver: AutomationDriver<THandle>,
		private readonly selectors: SelectorStore,
		private readonly credentials: Credentials,
		private readonly options: LoginFlowOptions,
		private readonly deps: LoginFlowDeps,
	) {
		this.interstitialTimeoutMs = options.interstitialTimeoutMs ?? 5000;
		this.clickDelayMs = options.clickDelayMs ?? 1000;
		this.settleDelayMs = options.settleDelayMs ?? 3000;
	}

	get currentState(): LoginState {
		return this.state;
	}

	async run(): Promise<void> {
		while (this.state !== "Ready") {
			const from = this.state;
			let next: LoginState;
			try {
				next = await this.step(from);
			} catch (error) {
				if (error instanceof LoginError || error instanceof ConfigurationError) {
					throw error;
				}
				throw new LoginError(
					"UnexpectedDriverFailure",
					`unexpected failure in state ${from}: ${formatError(error)}`,
					{ cause: error },
				);
			}
			this.deps.logger.debug("Login state changed", { from, to: next });
			this.state = next;
		}

		this.deps.logger.info("Login completed");
	}

	private step(state: LoginState): Promise<LoginState> {
		switch (state) {
			case "Start":
				return this.loadForm();
			case "FormLoaded":
				return this.submitCredentials();
			case "Submitted":
				return this.awaitRedirect();
			case "Redirected":
				return this.dismissSaveLoginPrompt();
			case "PostLoginCleanup":
				return this.confirmLogin();
			case "Ready":
				return Promise.resolve("Ready");
		}
	}

	private async loadForm(): Promise<LoginState> {
		const url = loginUrl(this.options.baseUrl);
		const usernameLocator = this.selectors.get("LOGIN_USERNAME_INPUT");
		const passwordLocator = this.selectors.get("LOGIN_PASSWORD_INPUT");

		try {
			await this.driver.navigate(url);
		} catch (error) {
			throw new LoginError(
				"NavigationFailed",
				`could not load ${url}: ${formatError(error)}`,
				{ cause: error },
			);
		}

		try {
			this.fields = await this.driver.waitUntil(async () => {
				const identifier = await firstVisible(this.driver, usernameLocator);
				const secret = await firstVisible(this.driver, passwordLocator);
				return identifier !== null && secret !== null
					? { identifier, secret }
					: null;
			}, this.options.timeoutMs, "the login form");
		} catch (error) {
			throw new LoginError(
				"FormNotFound",
				error instanceof WaitTimeoutError
					? `login form fields were not visible after ${this.options.timeoutMs}ms`
					: `could not locate login form fields: ${formatError(error)}`,
				{ cause: error },
			);
		}

		return "FormLoaded";
	}

	private async submitCredentials(): Promise<LoginState> {
		const fields = this.fields;
		if (!fields) {
			throw new LoginError("FormNotFound", "login form fields were not resolved");
		}

		try {
			await this.driver.type(fields.identifier, this.credentials.identifier);
			await this.driver.type(fields.secret, this.credentials.secret);
			await this.driver.submit(fields.secret);
		} catch (error) {
			// The driver message is left out: it can echo the typed value.
			throw new LoginError(
				"CredentialEntryFailed",
				"could not enter credentials into the login form",
				{ cause: error },
			);
		}

		await this.dismissInterstitial();
		return "Submitted";
	}

	private async awaitRedirect(): Promise<LoginState> {
		if (await this.waitForRedirect()) return "Redirected";

		this.deps.logger.debug("Still on the login page, looking for a login button");
		const candidates = await this.matchingControls(
			this.selectors.get("LOGIN_BUTTON_CANDIDATE"),
			this.selectors.keywords("login"),
		);
		if (candidates.length === 0) {
			throw new LoginError(
				"NoLoginControlFound",
				"no button on the login page matched a login keyword",
			);
		}

		if (!(await this.clickFirst(candidates))) {
			throw new LoginError(
				"NoLoginControlFound",
				`none of the ${candidates.length} matching login buttons could be clicked`,
			);
		}

		if (!(await this.waitForRedirect())) {
			throw new LoginError(
				"FallbackTimeout",
				"the login page was still shown after clicking the login button",
			);
		}

		try {
			await this.driver.waitUntil(
				async () => (await this.driver.readyState()) === "complete",
				this.options.timeoutMs,
				"the page to finish loading",
			);
		} catch (error) {
			throw new LoginError(
				"FallbackTimeout",
				"the page did not finish loading after the login button was clicked",
				{ cause: error },
			);
		}

		await this.deps.clock.sleep(this.settleDelayMs);
		return "Redirected";
	}

	private async dismissSaveLoginPrompt(): Promise<LoginState> {
		const buttonLocator = this.selectors.get("SAVE_LOGIN_INFO_BUTTON");
		const dialogLocator = this.selectors.get("SAVE_LOGIN_INFO_DIALOG");
		const keywords = this.selectors.keywords("dismissSaveLogin");
		const { logger } = this.deps;

		let buttons: THandle[];
		try {
			buttons = await this.driver.waitUntil(async () => {
				const found = await this.driver.find(buttonLocator);
				return found.length > 0 ? found : null;
			}, this.interstitialTimeoutMs, "the save-login prompt");
		} catch (error) {
			logger.debug("No save-login prompt shown", {
				reason: error instanceof WaitTimeoutError ? "timeout" : formatError(error),
			});
			return "PostLoginCleanup";
		}

		for (const button of buttons) {
			const text = await this.driver.readText(button).catch(() => "");
			if (!matchesKeyword(text, keywords, this.selectors.keywordMatch)) continue;

			try {
				await this.driver.click(button);
			} catch (error) {
				logger.warn("Save-login prompt button could not be clicked", {
					error: formatError(error),
				});
				continue;
			}

			try {
				await this.driver.waitUntil(
					async () => (await this.driver.find(dialogLocator)).length === 0,
					this.interstitialTimeoutMs,
					"the save-login prompt to close",
				);
				logger.info("Dismissed the save-login prompt");
			} catch (error) {
				logger.warn("Save-login prompt still shown after dismissal", {
					error: formatError(error),
				});
			}
			return "PostLoginCleanup";
		}

		logger.debug("No save-login dismiss button matched", { buttons: buttons.length });
		return "PostLoginCleanup";
	}

	private async confirmLogin(): Promise<LoginState> {
		let pageText: unknown;
		try {
			// Reads fail while a late redirect is still replacing the document.
			const read = await this.driver.waitUntil(
				async () => ({ text: await this.driver.executeScript(PAGE_TEXT_SCRIPT) }),
				this.options.timeoutMs,
				"the signed-in page",
			);
			pageText = read.text;
		} catch (error) {
			const failure =
				error instanceof WaitTimeoutError && error.cause !== undefined ? error.cause : error;
			throw new LoginError(
				"UnexpectedDriverFailure",
				`could not read the page after login: ${formatError(failure)}`,
				{ cause: failure },
			);
		}
		if (
			typeof pageText === "string" &&
			matchesKeyword(pageText, this.selectors.keywords("checkpoint"))
		) {
			throw new LoginError(
				"CheckpointRequired",
				"the site asks for account verification; complete it in a regular browser and retry",
			);
		}

		if (isLoginLocation(this.driver.currentUrl(), this.options.baseUrl)) {
			throw new LoginError(
				"LoginNotConfirmed",
				"the browser is back on the login page",
			);
		}

		return "Ready";
	}

	private async dismissInterstitial(): Promise<boolean> {
		const locator = this.selectors.get("IGNORE_BUTTON");
		const keywords = this.selectors.keywords("skipInterstitial");
		const { logger } = this.deps;

		let button: THandle;
		try {
			button = await this.driver.waitUntil(async () => {
				const [match] = await this.matchingControls(locator, keywords);
				return match ?? null;
			}, this.interstitialTimeoutMs, "the interstitial skip button");
		} catch (error) {
			logger.debug("No interstitial to skip", {
				reason: error instanceof WaitTimeoutError ? "timeout" : formatError(error),
			});
			return false;
		}

		await this.deps.clock.sleep(this.clickDelayMs);
		try {
			await this.driver.click(button);
			logger.info("Skipped the post-submit interstitial");
			return true;
		} catch (error) {
			logger.warn("Interstitial skip button could not be clicked", {
				error: formatError(error),
			});
			return false;
		}
	}

	private async waitForRedirect(): Promise<boolean> {
		try {
			await this.driver.waitUntil(
				async () => !isLoginLocation(this.driver.currentUrl(), this.options.baseUrl),
				this.options.timeoutMs,
				"a redirect away from the login page",
			);
			return true;
		} catch (error) {
			if (error instanceof WaitTimeoutError) return false;
			throw error;
		}
	}

	private async matchingControls(
		locator: string,
		keywords: readonly string[],
	): Promise<THandle[]> {
		const matches: THandle[] = [];
		for (const handle of await this.driver.find(locator)) {
			const text = await this.driver.readText(handle).catch(() => "");
			if (matchesKeyword(text, keywords, this.selectors.keywordMatch)) {
				matches.push(handle);
			}
		}
		return matches;
	}

	private async clickFirst(candidates: THandle[]): Promise<boolean> {
		for (const [index, candidate] of candidates.entries()) {
			try {
				await this.driver.click(candidate);
				this.deps.logger.debug("Clicked fallback login button", { index });
				return true;
			} catch (error) {
				this.deps.logger.debug("Skipping login button candidate", {
					index,
					error: formatError(error),
				});
			}
		}
		return false;
	}
}
