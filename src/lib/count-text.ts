import { ParseError } from "./errors.js";

const MULTIPLIERS: Record<string, number> = {
	mil: 1_000,
	k: 1_000,
	mi: 1_000_000,
	m: 1_000_000,
};

// Longest tokens first so "mil" is not read as "mi" + "l".
const SUFFIX_PATTERN = /^(.*?)\s?(mil|mi|k|m)$/i;
const COUNT_TOKEN_PATTERN = /\d(?:[\d.,]*\d)?(?:\s?(?:mil|mi|k|m)(?![a-z]))?/i;

function fail(input: string | null | undefined, reason: string): never {
	throw new ParseError(input, `Cannot parse count "${input ?? ""}": ${reason}.`);
}

function normalizeDecimal(
	input: string,
	numeric: string,
	hasMultiplier: boolean,
): string {
	const lastComma = numeric.lastIndexOf(",");
	const lastDot = numeric.lastIndexOf(".");

	if (lastComma >= 0 && lastDot >= 0) {
		const decimal = lastComma > lastDot ? "," : ".";
		const thousands = decimal === "," ? "." : ",";
		return numeric.split(thousands).join("").replace(decimal, ".");
	}

	if (lastComma >= 0) {
		const commas = numeric.split(",").length - 1;
		if (commas === 1 && /,\d$/.test(numeric)) {
			return numeric.replace(",", ".");
		}
		return numeric.split(",").join("");
	}

	if (lastDot >= 0) {
		const groups = numeric.split(".");
		if (hasMultiplier) {
			if (groups.length > 2) fail(input, "more than one decimal separator");
			return numeric;
		}
		if (groups.slice(1).every((group) => /^\d{3}$/.test(group))) {
			return groups.join("");
		}
		if (groups.length === 2) return numeric;
		fail(input, "ambiguous separators");
	}

	return numeric;
}

/**
 * Parses a displayed count such as "1,234", "1.2k", "2,5 mil" or "3M"
 * into an integer.
 */
export function parseCountText(text: string | null | undefined): number {
	if (text === null || text === undefined) fail(text, "no text");
	const trimmed = text.trim();
	if (!trimmed) fail(text, "empty text");

	const suffixMatch = trimmed.match(SUFFIX_PATTERN);
	const numeric = suffixMatch ? (suffixMatch[1] ?? "") : trimmed;
	const suffix = suffixMatch?.[2]?.toLowerCase();
	const multiplier = suffix ? (MULTIPLIERS[suffix] ?? 1) : 1;

	if (!/^[\d.,]+$/.test(numeric) || !/\d/.test(numeric)) {
		fail(text, "not a number");
	}

	const decimal = normalizeDecimal(text, numeric, suffix !== undefined);
	if (!/^\d+(\.\d+)?$/.test(decimal)) fail(text, "malformed number");

	const value = Math.round(Number.parseFloat(decimal) * multiplier);
	if (!Number.isSafeInteger(value) || value < 0) fail(text, "out of range");
	return value;
}

/**
 * Finds the first count token in free text, keeping a multiplier that
 * follows the number: "2,5 mil seguidores" gives "2,5 mil".
 */
export function extractCountText(text: string | null | undefined): string | null {
	if (!text) return null;
	const match = text.replace(/\s+/g, " ").match(COUNT_TOKEN_PATTERN);
	return match ? match[0].trim() : null;
}
