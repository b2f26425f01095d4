import fs from "node:fs";
import { fileURLToPath } from "node:url";
import JSON5 from "json5";
import { z } from "zod";
import { ConfigurationError, formatError } from "./errors.js";
import type { KeywordMatchMode } from "./keywords.js";

export const REQUIRED_SELECTORS = [
	"LOGIN_USERNAME_INPUT",
	"LOGIN_PASSWORD_INPUT",
	"LOGIN_BUTTON_CANDIDATE",
	"IGNORE_BUTTON",
	"SAVE_LOGIN_INFO_DIALOG",
	"SAVE_LOGIN_INFO_BUTTON",
	"FOLLOWERS_LINK",
	"FOLLOWING_LINK",
	"CLOSE_MODAL_BUTTON",
	"PROFILE_USERNAME_SPAN",
	"LIST_CONTAINER",
	"LOADING_SPINNER",
] as const;

export type SelectorName = (typeof REQUIRED_SELECTORS)[number];

export const KEYWORD_GROUPS = [
	"login",
	"skipInterstitial",
	"dismissSaveLogin",
	"checkpoint",
] as const;

export type KeywordGroup = (typeof KEYWORD_GROUPS)[number];

export const DEFAULT_SELECTORS_FILE = fileURLToPath(
	new URL("../../config/selectors.json5", import.meta.url),
);

const selectorFileSchema = z
	.object({
		selectors: z.record(z.string().trim().min(1)).optional(),
		keywords: z
			.record(z.enum(KEYWORD_GROUPS), z.array(z.string().trim().min(1)))
			.optional(),
		keywordMatch: z.enum(["substring", "exact"]).optional(),
	})
	.strict();

export type SelectorFile = z.infer<typeof selectorFileSchema>;

export interface SelectorSnapshot {
	selectors: Record<string, string>;
	keywords: Record<KeywordGroup, string[]>;
	keywordMatch: KeywordMatchMode;
	sources: string[];
}

function validate(parsed: unknown, source: string): SelectorFile {
	const result = selectorFileSchema.safeParse(parsed);
	if (result.success) return result.data;

	const issue = result.error.issues[0];
	const location = issue?.path.length ? issue.path.join(".") : "(root)";
	throw new ConfigurationError(
		`Selector file ${source} is invalid at ${location}: ${issue?.message ?? "unknown issue"}.`,
		{ file: source },
	);
}

export function readSelectorFile(file: string): SelectorFile {
	let raw: string;
	try {
		raw = fs.readFileSync(file, "utf8");
	} catch (error) {
		throw new ConfigurationError(
			`Selector file could not be read: ${file} (${formatError(error)}).`,
			{ file },
			{ cause: error },
		);
	}

	let parsed: unknown;
	try {
		parsed = JSON5.parse(raw);
	} catch (error) {
		throw new ConfigurationError(
			`Selector file ${file} is not valid JSON5: ${formatError(error)}.`,
			{ file },
			{ cause: error },
		);
	}

	return validate(parsed, file);
}

/**
 * Locators and keyword lists, loaded once and checked for every key the
 * login flow and the list extractor ask for. Lookups never yield
 * `undefined`: a missing key is a {@link ConfigurationError}.
 */
export class SelectorStore {
	private constructor(
		private readonly selectors: ReadonlyMap<string, string>,
		private readonly keywordGroups: ReadonlyMap<KeywordGroup, readonly string[]>,
		readonly keywordMatch: KeywordMatchMode,
		readonly sources: readonly string[],
	) {}

	static load(options: { file?: string; defaultsFile?: string } = {}): SelectorStore {
		const defaultsFile = options.defaultsFile ?? DEFAULT_SELECTORS_FILE;
		const layers = [readSelectorFile(defaultsFile)];
		const sources = [defaultsFile];

		if (options.file) {
			layers.push(readSelectorFile(options.file));
			sources.push(options.file);
		}

		return SelectorStore.merge(layers, sources);
	}

	static from(definition: unknown, source = "inline"): SelectorStore {
		return SelectorStore.merge([validate(definition, source)], [source]);
	}

	private static merge(layers: SelectorFile[], sources: string[]): SelectorStore {
		const selectors = new Map<string, string>();
		const keywordGroups = new Map<KeywordGroup, readonly string[]>();
		let keywordMatch: KeywordMatchMode = "substring";

		for (const layer of layers) {
			for (const [key, value] of Object.entries(layer.selectors ?? {})) {
				selectors.set(key, value);
			}
			for (const group of KEYWORD_GROUPS) {
				const words = layer.keywords?.[group];
				if (words) keywordGroups.set(group, Object.freeze([...words]));
			}
			keywordMatch = layer.keywordMatch ?? keywordMatch;
		}

		const origin = sources.join(", ");
		for (const key of REQUIRED_SELECTORS) {
			if (!selectors.has(key)) {
				throw new ConfigurationError(
					`Required selector "${key}" is missing from ${origin}.`,
					{ key },
				);
			}
		}
		for (const group of KEYWORD_GROUPS) {
			if (!keywordGroups.get(group)?.length) {
				throw new ConfigurationError(
					`Keyword group "${group}" is missing or empty in ${origin}.`,
					{ key: group },
				);
			}
		}

		return new SelectorStore(selectors, keywordGroups, keywordMatch, sources);
	}

	get(name: SelectorName | (string & {})): string {
		const value = this.selectors.get(name);
		if (value === undefined) {
			throw new ConfigurationError(`Unknown selector "${name}".`, {
				key: name,
			});
		}
		return value;
	}

	keywords(group: KeywordGroup): readonly string[] {
		const words = this.keywordGroups.get(group);
		if (!words) {
			throw new ConfigurationError(`Unknown keyword group "${group}".`, {
				key: group,
			});
		}
		return words;
	}

	snapshot(): SelectorSnapshot {
		return {
			selectors: Object.fromEntries(this.selectors),
			keywords: {
				login: [...this.keywords("login")],
				skipInterstitial: [...this.keywords("skipInterstitial")],
				dismissSaveLogin: [...this.keywords("dismissSaveLogin")],
				checkpoint: [...this.keywords("checkpoint")],
			},
			keywordMatch: this.keywordMatch,
			sources: [...this.sources],
		};
	}
}
