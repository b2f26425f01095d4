import { describe, expect, it } from "vitest";
import { createConsoleLogger, formatFields } from "../../src/lib/logger.js";

describe("console logger", () => {
	it("formats level, message and fields", () => {
		const lines: string[] = [];
		const logger = createConsoleLogger({ color: false, write: (line) => lines.push(line) });

		logger.info("Extraction finished", {
			profile: "target",
			collected: 2,
			expected: null,
			skipped: undefined,
		});
		logger.warn("Slow page");
		logger.error("Gave up", { attempts: 3 });

		expect(lines).toEqual([
			"[listharvest] INFO  Extraction finished profile=target collected=2 expected=null",
			"[listharvest] WARN  Slow page",
			"[listharvest] ERROR Gave up attempts=3",
		]);
	});

	it("prints debug lines only when verbose", () => {
		const quiet: string[] = [];
		const verbose: string[] = [];

		createConsoleLogger({ color: false, write: (line) => quiet.push(line) }).debug("hidden");
		createConsoleLogger({
			color: false,
			verbose: true,
			write: (line) => verbose.push(line),
		}).debug("shown", { step: 1 });

		expect(quiet).toEqual([]);
		expect(verbose).toEqual(["[listharvest] DEBUG shown step=1"]);
	});

	it("formats empty field sets as nothing", () => {
		expect(formatFields()).toBe("");
		expect(formatFields({ only: undefined })).toBe("");
	});
});
