import { describe, expect, it } from "vitest";
import {
	DEFAULT_TUNABLES,
	ListExtractionEngine,
	resolveTunables,
} from "../../src/browser/list-extractor.js";
import { ConfigurationError, ParseError } from "../../src/lib/errors.js";
import { silentLogger } from "../../src/lib/logger.js";
import { BASE_URL, FakeDriver, el, testSelectors } from "../support/fake-driver.js";

const PROFILE_URL = `${BASE_URL}/target/`;

function createEngine(driver: FakeDriver) {
	return new ListExtractionEngine(
		driver,
		testSelectors(),
		{ baseUrl: BASE_URL, timeoutMs: 1000 },
		{ logger: silentLogger, clock: driver.clock },
	);
}

/** Renders `batches` cumulatively, revealing the next batch on every scroll. */
function feed(driver: FakeDriver, batches: string[][]): void {
	let shown = 0;
	const render = () =>
		driver.setElements(
			"item",
			batches.slice(0, shown + 1).flat().map((name) => el(name, name)),
		);
	render();
	driver.onScroll = () => {
		if (shown < batches.length - 1) shown += 1;
		render();
	};
}

function profilePage(driver: FakeDriver, linkText: string): void {
	driver.setElements("followers-link", [el("followers", linkText)]);
	driver.setElements("container", [el("list")]);
	driver.setElements("close", [el("close")]);
}

describe("list extraction engine", () => {
	it("collects unique handles in discovery order until the expected count", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "5 followers");
		feed(driver, [["ana", "bea"], ["bea", "caio"], ["davi", "eva"]]);

		const result = await createEngine(driver).extract({
			profile: "target",
			kind: "followers",
		});

		expect(result).toEqual({
			profile: "target",
			kind: "followers",
			handles: ["ana", "bea", "caio", "davi", "eva"],
			expectedCount: 5,
			stopReason: "complete",
			iterations: 3,
			refreshes: 0,
			elapsedMs: 1000,
		});
		expect(driver.navigations).toEqual([PROFILE_URL]);
		expect(driver.clicks).toEqual(["followers", "close"]);
		expect(driver.scrolls).toEqual([
			{ id: "list", amount: 2200 },
			{ id: "list", amount: 2200 },
		]);
	});

	it("trims handles and skips blank or unreadable items", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "2 followers");
		driver.setElements("item", [
			el("a", "  ana  "),
			el("blank", "   "),
			el("broken", "", { failRead: true }),
			el("b", "bea"),
		]);

		const result = await createEngine(driver).extract({
			profile: "target",
			kind: "followers",
		});

		expect(result.handles).toEqual(["ana", "bea"]);
		expect(result.stopReason).toBe("complete");
	});

	it("prefers a requested expected count over the displayed one", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "900 followers");
		feed(driver, [["ana", "bea"], ["caio"]]);

		const result = await createEngine(driver).extract({
			profile: "target",
			kind: "followers",
			expectedCount: 2,
		});

		expect(result.handles).toEqual(["ana", "bea"]);
		expect(result.expectedCount).toBe(2);
		expect(result.iterations).toBe(1);
	});

	it("returns an empty result when the list cannot be opened", async () => {
		const driver = new FakeDriver();

		const result = await createEngine(driver).extract({
			profile: "target",
			kind: "following",
		});

		expect(result.handles).toEqual([]);
		expect(result.stopReason).toBe("unavailable");
		expect(result.iterations).toBe(0);
		expect(result.expectedCount).toBeNull();
	});

	it("returns an empty result when the entry point cannot be clicked", async () => {
		const driver = new FakeDriver();
		driver.setElements("following-link", [el("following", "12 following", { failClick: true })]);

		const result = await createEngine(driver).extract({
			profile: "target",
			kind: "following",
		});

		expect(result.stopReason).toBe("unavailable");
		expect(result.handles).toEqual([]);
	});

	it("stops at the deadline with a partial result", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "Followers");
		let next = 0;
		const render = () =>
			driver.setElements(
				"item",
				Array.from({ length: next + 1 }, (_, index) => el(`u${index}`, `u${index}`)),
			);
		render();
		driver.onScroll = () => {
			next += 1;
			render();
		};

		const result = await createEngine(driver).extract({
			profile: "target",
			kind: "followers",
			maxDurationMs: 1200,
		});

		expect(result.stopReason).toBe("deadline");
		expect(result.handles).toEqual(["u0", "u1", "u2"]);
		expect(result.expectedCount).toBeNull();
		expect(result.iterations).toBe(3);
		expect(result.elapsedMs).toBe(1500);
	});

	it("stops within one iteration past the deadline when nothing new loads", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "10 followers");
		driver.setElements("item", [el("ana", "ana")]);

		const result = await createEngine(driver).extract({
			profile: "target",
			kind: "followers",
			maxDurationMs: 100,
		});

		expect(result.stopReason).toBe("deadline");
		expect(result.handles).toEqual(["ana"]);
		expect(result.iterations).toBe(1);
		expect(result.elapsedMs).toBe(500);
		expect(result.elapsedMs).toBeLessThanOrEqual(100 + DEFAULT_TUNABLES.pauseTimeMs);
	});

	it("settles, refreshes, then reports convergence", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "10 followers");
		driver.setElements("item", [el("ana", "ana"), el("bea", "bea")]);

		const result = await createEngine(driver).extract(
			{ profile: "target", kind: "followers" },
			resolveTunables(DEFAULT_TUNABLES, { maxRefreshAttempts: 1 }),
		);

		expect(result.handles).toEqual(["ana", "bea"]);
		expect(result.stopReason).toBe("converged");
		expect(result.refreshes).toBe(1);
		expect(result.iterations).toBe(5);
		expect(driver.navigations).toEqual([PROFILE_URL, PROFILE_URL]);
		expect(driver.clicks).toEqual(["followers", "followers", "close"]);
	});

	it("keeps going when the settle phase finds more handles", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "3 followers");
		driver.setElements("item", [el("ana", "ana")]);
		let scrolls = 0;
		driver.onScroll = () => {
			scrolls += 1;
			// Only the third scroll, the first of the settle phase, loads more.
			if (scrolls === 3) {
				driver.setElements("item", [el("ana", "ana"), el("bea", "bea"), el("caio", "caio")]);
			}
		};

		const result = await createEngine(driver).extract(
			{ profile: "target", kind: "followers" },
			resolveTunables(DEFAULT_TUNABLES, { maxRefreshAttempts: 0 }),
		);

		expect(result.handles).toEqual(["ana", "bea", "caio"]);
		expect(result.stopReason).toBe("complete");
		expect(result.refreshes).toBe(0);
	});

	it("waits for the loading indicator before settling", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "10 followers");
		driver.setElements("item", [el("ana", "ana")]);
		driver.setElements("spinner", [el("spinner")]);

		const result = await createEngine(driver).extract(
			{ profile: "target", kind: "followers" },
			resolveTunables(DEFAULT_TUNABLES, { maxRefreshAttempts: 0 }),
		);

		expect(result.stopReason).toBe("converged");
		// Two regular iterations, a 10s spinner wait, then one settle pause.
		expect(result.elapsedMs).toBe(500 + 500 + 10_000 + 500);
	});

	it("scrolls the last item when the list container is missing", async () => {
		const driver = new FakeDriver();
		driver.setElements("followers-link", [el("followers", "2 followers")]);
		feed(driver, [["ana"], ["bea"]]);

		const result = await createEngine(driver).extract({
			profile: "target",
			kind: "followers",
		});

		expect(result.handles).toEqual(["ana", "bea"]);
		expect(driver.scrolls).toEqual([{ id: "ana", amount: 2200 }]);
	});

	it("treats a failing item lookup as no growth", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "4 followers");
		driver.failFind("item");

		const result = await createEngine(driver).extract(
			{ profile: "target", kind: "followers" },
			resolveTunables(DEFAULT_TUNABLES, { maxRefreshAttempts: 0 }),
		);

		expect(result.handles).toEqual([]);
		expect(result.stopReason).toBe("converged");
	});

	it("keeps an unreadable count as unknown", async () => {
		const driver = new FakeDriver();
		profilePage(driver, "1.2.3 followers");
		driver.setElements("item", [el("ana", "ana")]);

		const result = await createEngine(driver).extract(
			{ profile: "target", kind: "followers" },
			resolveTunables(DEFAULT_TUNABLES, { maxRefreshAttempts: 0 }),
		);

		expect(result.expectedCount).toBeNull();
		expect(result.handles).toEqual(["ana"]);
	});

	describe("totalCount", () => {
		it("parses the entry point count without scrolling", async () => {
			const driver = new FakeDriver();
			profilePage(driver, "2,5 mil seguidores");

			const count = await createEngine(driver).totalCount("target", "followers");

			expect(count).toBe(2500);
			expect(driver.clicks).toEqual(["followers", "close"]);
			expect(driver.scrolls).toEqual([]);
		});

		it("waits for a close control that renders after the click", async () => {
			const driver = new FakeDriver();
			let closeShownAt = Number.POSITIVE_INFINITY;
			driver.setElements("followers-link", [
				el("followers", "12 followers", {
					onClick: () => {
						closeShownAt = driver.clock.now() + 300;
					},
				}),
			]);
			const find = driver.find.bind(driver);
			driver.find = async (locator) => {
				if (locator !== "close") return find(locator);
				return driver.clock.now() >= closeShownAt ? [el("close")] : [];
			};

			const count = await createEngine(driver).totalCount("target", "followers");

			expect(count).toBe(12);
			expect(driver.clicks).toEqual(["followers", "close"]);
			// Polls at 0 and 250 miss it; the one at 500 finds it.
			expect(driver.clock.now()).toBe(500);
		});

		it("returns null when the profile has no entry point", async () => {
			const driver = new FakeDriver();

			await expect(createEngine(driver).totalCount("target", "following")).resolves.toBeNull();
		});

		it("propagates unparseable counts", async () => {
			const driver = new FakeDriver();
			profilePage(driver, "1.2.3 followers");

			await expect(
				createEngine(driver).totalCount("target", "followers"),
			).rejects.toBeInstanceOf(ParseError);
		});
	});

	describe("resolveTunables", () => {
		it("applies overrides and freezes the result", () => {
			const tunables = resolveTunables(DEFAULT_TUNABLES, {
				pauseTimeMs: 250,
				maxAttempts: undefined,
			});

			expect(tunables).toEqual({ ...DEFAULT_TUNABLES, pauseTimeMs: 250 });
			expect(Object.isFrozen(tunables)).toBe(true);
		});

		it("rejects negative or fractional values", () => {
			expect(() => resolveTunables(DEFAULT_TUNABLES, { maxAttempts: -1 })).toThrow(
				ConfigurationError,
			);
			expect(() => resolveTunables(DEFAULT_TUNABLES, { waitIntervalMs: 1.5 })).toThrow(
				'Tunable "waitIntervalMs" must be a non-negative integer, got 1.5.',
			);
		});
	});
});
