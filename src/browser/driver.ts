import type { WaitCondition } from "../lib/timing.js";

export type ReadyState = "loading" | "interactive" | "complete";

/**
 * The browser capabilities the login flow and the list extractor rely on.
 * `THandle` is whatever the implementation uses to point at a rendered
 * element; callers only pass it back into the driver.
 */
export interface AutomationDriver<THandle> {
	navigate(url: string): Promise<void>;
	find(locator: string): Promise<THandle[]>;
	/**
	 * Rejects with `WaitTimeoutError` once `timeoutMs` has elapsed. A
	 * condition that throws is retried until then.
	 */
	waitUntil<T>(condition: WaitCondition<T>, timeoutMs: number, description?: string): Promise<T>;
	isVisible(handle: THandle): Promise<boolean>;
	click(handle: THandle): Promise<void>;
	/** Clears the field, then types `text`. */
	type(handle: THandle, text: string): Promise<void>;
	/** Implicit form submission from a field (Enter key). */
	submit(handle: THandle): Promise<void>;
	readText(handle: THandle): Promise<string>;
	scroll(handle: THandle, amount: number): Promise<void>;
	executeScript(source: string): Promise<unknown>;
	currentUrl(): string;
	readyState(): Promise<ReadyState>;
	/** Safe to call more than once; only the first call releases the browser. */
	close(): Promise<void>;
}

export interface DriverLaunchOptions {
	headless: boolean;
	timeoutMs: number;
}

export type DriverLauncher<THandle> = (
	options: DriverLaunchOptions,
) => Promise<AutomationDriver<THandle>>;

export async function firstVisible<THandle>(
	driver: AutomationDriver<THandle>,
	locator: string,
): Promise<THandle | null> {
	for (const handle of await driver.find(locator)) {
		if (await driver.isVisible(handle).catch(() => false)) return handle;
	}
	return null;
}
