import { describe, expect, it } from "vitest";
import { extractCountText, parseCountText } from "../../src/lib/count-text.js";
import { ParseError } from "../../src/lib/errors.js";

describe("count text parser", () => {
	it.each([
		["1,234", 1234],
		["1.234", 1234],
		["1.234.567", 1234567],
		["1,234,567", 1234567],
		["567", 567],
		["0", 0],
		["1.2k", 1200],
		["1,2k", 1200],
		["15K", 15000],
		["3M", 3000000],
		["2,5 mil", 2500],
		["2.5 mil", 2500],
		["1 mi", 1000000],
		["1,5 mi", 1500000],
		["1.234,5", 1235],
		[" 42 ", 42],
	])("parses %j as %i", (input, expected) => {
		expect(parseCountText(input)).toBe(expected);
	});

	it.each(["abc", "123x", "10kk", "", "   ", "1.2.3", "k"])("rejects %j", (input) => {
		expect(() => parseCountText(input)).toThrow(ParseError);
	});

	it("rejects a missing value and keeps the input on the error", () => {
		expect(() => parseCountText(null)).toThrow('Cannot parse count "": no text.');

		try {
			parseCountText("12 apples");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ParseError);
			expect(error).toMatchObject({ input: "12 apples" });
		}
	});
});

describe("count token extraction", () => {
	it.each([
		["1,234 followers", "1,234"],
		["2,5 mil seguidores", "2,5 mil"],
		["3M followers", "3M"],
		["12 following", "12"],
		["1.2k\nfollowers", "1.2k"],
		["Seguidores: 987", "987"],
	])("finds the count in %j", (input, expected) => {
		expect(extractCountText(input)).toBe(expected);
	});

	it("returns null without a number", () => {
		expect(extractCountText("Followers")).toBeNull();
		expect(extractCountText("")).toBeNull();
		expect(extractCountText(undefined)).toBeNull();
	});
});
