import { beforeEach, describe, expect, it } from "vitest";
import { Output } from "../../src/lib/output.js";
import type { ExtractionResult } from "../../src/lib/types.js";
import { testSelectors } from "../support/fake-driver.js";

describe("output", () => {
	let lines: string[];
	let errors: string[];
	let out: Output;

	beforeEach(() => {
		lines = [];
		errors = [];
		out = new Output({
			plain: true,
			write: (line) => lines.push(line),
			writeError: (line) => errors.push(line),
		});
	});

	const result: ExtractionResult = {
		profile: "target",
		kind: "followers",
		handles: ["ana", "bea"],
		expectedCount: 5,
		stopReason: "deadline",
		iterations: 4,
		refreshes: 0,
		elapsedMs: 1500,
	};

	it("prints basic streams", () => {
		out.info("hello");
		out.warn("careful");
		out.error("broken");

		expect(lines).toEqual(["hello"]);
		expect(errors).toEqual(["careful", "broken"]);
	});

	it("prints handles with a summary line", () => {
		out.handles(result);

		expect(lines).toEqual(["ana", "bea", "2/5 followers • deadline • 1500ms"]);
		expect(errors).toEqual([]);
	});

	it("flags a list that could not be opened", () => {
		out.handles({
			...result,
			handles: [],
			expectedCount: null,
			stopReason: "unavailable",
			elapsedMs: 0,
		});

		expect(lines).toEqual([
			"No followers found for @target.",
			"0/? followers • unavailable • 0ms",
		]);
		expect(errors).toEqual(["The followers list of @target could not be opened."]);
	});

	it("prints counts", () => {
		out.count({ profile: "target", kind: "followers", count: 1234 });
		out.count({ profile: "target", kind: "following", count: null });

		expect(lines).toEqual(["@target followers: 1234"]);
		expect(errors).toEqual(["No following count shown for @target."]);
	});

	it("prints the session status", () => {
		out.status({ state: "Authenticated", baseUrl: "https://social.test" });

		expect(lines).toEqual(["Session: Authenticated", "Base URL: https://social.test"]);
	});

	it("prints the selector configuration", () => {
		out.selectors(testSelectors().snapshot());

		expect(lines[0]).toBe("Selectors");
		expect(lines).toContain("PROFILE_USERNAME_SPAN: item");
		expect(lines).toContain("Keywords (substring)");
		expect(lines).toContain("login: entrar, log in");
		expect(lines.at(-1)).toBe("Sources: inline");
	});

	it("prints JSON", () => {
		out.json(["ana"]);

		expect(lines).toEqual(['[\n  "ana"\n]']);
	});
});
