import type { RelationshipClient } from "../client/client.js";
import { isProfileId, normalizeProfileId } from "../lib/identifiers.js";
import {
	parseExtractionOptions,
	parseJsonFlag,
	parseListKind,
} from "../lib/options.js";
import type { Output } from "../lib/output.js";
import type { SelectorStore } from "../lib/selectors.js";
import type { ListKind } from "../lib/types.js";

function parseRawArgs(options: unknown): Record<string, unknown> {
	if (options && typeof options === "object" && !Array.isArray(options)) {
		return Object.fromEntries(Object.entries(options));
	}
	return {};
}

function parseProfile(value: string): string {
	if (!isProfileId(value)) {
		throw new Error(`Invalid profile "${value}". Use a username, @username or profile URL.`);
	}
	return normalizeProfileId(value);
}

/** Runs `task` against a freshly signed-in client and releases it afterwards. */
export type Connect = <T>(task: (client: RelationshipClient) => Promise<T>) => Promise<T>;

export interface HandlerDeps {
	connect: Connect;
	loadSelectors: () => SelectorStore;
	output: Output;
	baseUrl: string;
}

export function createHandlers({ connect, loadSelectors, output, baseUrl }: HandlerDeps) {
	const list = async (kind: ListKind, profileRef: string, options: unknown) => {
		const raw = parseRawArgs(options);
		const profile = parseProfile(profileRef);
		const extraction = parseExtractionOptions(raw);
		const json = parseJsonFlag(raw);

		const result = await connect((client) =>
			client.extract(
				{ profile, kind, maxDurationMs: extraction.maxDurationMs },
				extraction.tunables,
			),
		);

		if (json.json) {
			output.json(json.jsonFull ? result : result.handles);
			return;
		}
		output.handles(result);
	};

	return {
		followers: (profile: string, options: unknown) => list("followers", profile, options),

		following: (profile: string, options: unknown) => list("following", profile, options),

		count: async (profileRef: string, options: unknown) => {
			const raw = parseRawArgs(options);
			const profile = parseProfile(profileRef);
			const kind = parseListKind(raw.kind);

			const count = await connect((client) => client.getTotalCount(profile, kind));
			if (parseJsonFlag(raw).json) {
				output.json({ profile, kind, count });
				return;
			}
			output.count({ profile, kind, count });
		},

		check: async () => {
			const state = await connect(async (client) => client.state);
			output.status({ state, baseUrl });
		},

		selectors: async (options: unknown) => {
			const snapshot = loadSelectors().snapshot();
			if (parseJsonFlag(parseRawArgs(options)).json) {
				output.json(snapshot);
				return;
			}
			output.selectors(snapshot);
		},
	};
}

export type CommandHandlers = ReturnType<typeof createHandlers>;
