import fs from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import JSON5 from "json5";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const count = z.number().int().nonnegative();

const fileConfigSchema = z.object({
	username: z.string().optional(),
	password: z.string().optional(),
	baseUrl: z.string().url().optional(),
	selectors: z.string().min(1).optional(),
	timeoutMs: z.number().int().positive().optional(),
	headless: z.boolean().optional(),
	plain: z.boolean().optional(),
	color: z.boolean().optional(),
	verbose: z.boolean().optional(),
	tunables: z
		.object({
			maxRefreshAttempts: count,
			waitIntervalMs: count,
			additionalScrollAttempts: count,
			pauseTimeMs: count,
			maxAttempts: count,
		})
		.partial()
		.strict()
		.optional(),
});

export type CliFileConfig = z.infer<typeof fileConfigSchema>;

/** Missing or unparseable files count as empty; a file with wrong value types does not. */
function readConfigFile(filePath: string): CliFileConfig {
	if (!fs.existsSync(filePath)) return {};

	let parsed: unknown;
	try {
		parsed = JSON5.parse(fs.readFileSync(filePath, "utf8"));
	} catch {
		return {};
	}
	if (!parsed || typeof parsed !== "object") return {};

	const result = fileConfigSchema.safeParse(parsed);
	if (!result.success) {
		const issue = result.error.issues[0];
		const at = issue?.path.join(".") || "(root)";
		throw new ConfigurationError(
			`Config file ${filePath} is invalid at ${at}: ${issue?.message ?? "unknown problem"}.`,
			{ file: filePath, key: at },
		);
	}
	return result.data;
}

export function configFilePaths(cwd = process.cwd(), home = homedir()): string[] {
	return [
		path.join(home, ".config", "listharvest", "config.json5"),
		path.join(cwd, ".listharvestrc.json5"),
	];
}

export function loadConfig(cwd = process.cwd(), home = homedir()): CliFileConfig {
	let merged: CliFileConfig = {};
	for (const file of configFilePaths(cwd, home)) {
		const layer = readConfigFile(file);
		merged = {
			...merged,
			...layer,
			tunables: { ...merged.tunables, ...layer.tunables },
		};
	}
	return merged;
}

function parseTruthy(value: string | undefined): boolean | undefined {
	if (!value) return undefined;
	const normalized = value.trim().toLowerCase();
	if (["1", "true", "yes", "on"].includes(normalized)) return true;
	if (["0", "false", "no", "off"].includes(normalized)) return false;
	return undefined;
}

export function resolveEnvConfig(
	env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
	return {
		username: env.LISTHARVEST_USERNAME,
		password: env.LISTHARVEST_PASSWORD,
		baseUrl: env.LISTHARVEST_BASE_URL,
		selectors: env.LISTHARVEST_SELECTORS,
		timeout: env.LISTHARVEST_TIMEOUT_MS,
		headless: parseTruthy(env.LISTHARVEST_HEADLESS),
		verbose: parseTruthy(env.LISTHARVEST_VERBOSE),
		color: env.NO_COLOR ? false : undefined,
	};
}
