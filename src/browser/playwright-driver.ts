import {
	type Browser,
	type BrowserContext,
	type Locator,
	type Page,
	chromium,
} from "playwright";
import { type Clock, type WaitCondition, pollUntil, systemClock } from "../lib/timing.js";
import type {
	AutomationDriver,
	DriverLaunchOptions,
	DriverLauncher,
	ReadyState,
} from "./driver.js";

const MOBILE_USER_AGENT =
	"Mozilla/5.0 (Linux; Android 8.0; Nexus 5 Build/OPR6.170623.013) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Mobile Safari/537.36";

const TYPING_DELAY_MS = 35;

export class PlaywrightDriver implements AutomationDriver<Locator> {
	private closed = false;

	constructor(
		private readonly browser: Browser,
		readonly context: BrowserContext,
		readonly page: Page,
		private readonly clock: Clock = systemClock,
	) {}

	static async launch(options: DriverLaunchOptions): Promise<PlaywrightDriver> {
		const browser = await chromium.launch({ headless: options.headless });

		try {
			const context = await browser.newContext({
				userAgent: MOBILE_USER_AGENT,
				viewport: { width: 375, height: 667 },
				isMobile: true,
				hasTouch: true,
			});
			await context.addInitScript(() => {
				Object.defineProperty(navigator, "webdriver", { get: () => undefined });
			});

			const page = await context.newPage();
			page.setDefaultTimeout(options.timeoutMs);
			page.setDefaultNavigationTimeout(options.timeoutMs);
			return new PlaywrightDriver(browser, context, page);
		} catch (error) {
			await browser.close();
			throw error;
		}
	}

	async navigate(url: string): Promise<void> {
		await this.page.goto(url, { waitUntil: "domcontentloaded" });
	}

	find(locator: string): Promise<Locator[]> {
		return this.page.locator(locator).all();
	}

	waitUntil<T>(condition: WaitCondition<T>, timeoutMs: number, description?: string): Promise<T> {
		return pollUntil(this.clock, condition, { timeoutMs, intervalMs: 250, description });
	}

	isVisible(handle: Locator): Promise<boolean> {
		return handle.isVisible();
	}

	async click(handle: Locator): Promise<void> {
		await handle.click();
	}

	async type(handle: Locator, text: string): Promise<void> {
		await handle.clear();
		await handle.pressSequentially(text, { delay: TYPING_DELAY_MS });
	}

	async submit(handle: Locator): Promise<void> {
		await handle.press("Enter");
	}

	readText(handle: Locator): Promise<string> {
		return handle.innerText();
	}

	async scroll(handle: Locator, amount: number): Promise<void> {
		await handle.evaluate((element, delta) => {
			if (element.scrollHeight > element.clientHeight) {
				element.scrollBy(0, delta);
			} else {
				element.scrollIntoView({ block: "end" });
			}
		}, amount);
	}

	executeScript(source: string): Promise<unknown> {
		return this.page.evaluate<unknown>(source);
	}

	currentUrl(): string {
		return this.page.url();
	}

	readyState(): Promise<ReadyState> {
		return this.page.evaluate(() => document.readyState);
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.browser.close();
	}
}

export const launchPlaywrightDriver: DriverLauncher<Locator> = (options) =>
	PlaywrightDriver.launch(options);
