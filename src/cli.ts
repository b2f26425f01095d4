#!/usr/bin/env node
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { createProgram, registerGlobalOptions } from "./cli/program.js";
import { withSession } from "./client/session.js";
import { type Connect, createHandlers } from "./commands/handlers.js";
import { loadConfig, resolveEnvConfig } from "./lib/config.js";
import { DEFAULT_BASE_URL, normalizeBaseUrl } from "./lib/identifiers.js";
import { createConsoleLogger } from "./lib/logger.js";
import { parseGlobalOptions, requireCredentials } from "./lib/options.js";
import { Output } from "./lib/output.js";
import { SelectorStore } from "./lib/selectors.js";
import type { GlobalOptions } from "./lib/types.js";

const FALLBACK_VERSION = "0.1.0";

export function readVersion(
	packageJsonUrl = new URL("../package.json", import.meta.url),
): string {
	try {
		const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonUrl, "utf8"));
		if (parsed && typeof parsed === "object" && "version" in parsed) {
			return typeof parsed.version === "string" ? parsed.version : FALLBACK_VERSION;
		}
		return FALLBACK_VERSION;
	} catch {
		return FALLBACK_VERSION;
	}
}

function compactObject(input: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(input).filter(([, value]) => value !== undefined),
	);
}

export function parseGlobalCliOptions(
	args: string[],
	env: NodeJS.ProcessEnv = process.env,
	cwd = process.cwd(),
	home?: string,
): GlobalOptions {
	const parser = registerGlobalOptions(new Command());
	parser.allowUnknownOption(true);
	parser.parseOptions(args);
	const cliRaw = parser.opts<Record<string, unknown>>();
	if (!args.includes("--plain")) cliRaw.plain = undefined;
	if (!args.includes("--no-color")) cliRaw.color = undefined;
	if (!args.includes("--verbose")) cliRaw.verbose = undefined;
	if (!args.includes("--no-headless")) cliRaw.headless = undefined;

	const fileConfig = loadConfig(cwd, home);
	const configRaw: Record<string, unknown> = {
		username: fileConfig.username,
		password: fileConfig.password,
		baseUrl: fileConfig.baseUrl,
		selectors: fileConfig.selectors,
		timeout: fileConfig.timeoutMs,
		headless: fileConfig.headless,
		plain: fileConfig.plain,
		color: fileConfig.color,
		verbose: fileConfig.verbose,
		tunables: fileConfig.tunables,
	};

	const options = parseGlobalOptions({
		...configRaw,
		...compactObject(resolveEnvConfig(env)),
		...compactObject(cliRaw),
	});

	if (options.plain) options.color = false;
	return options;
}

export async function runCli(rawArgs = process.argv.slice(2)): Promise<void> {
	const args = rawArgs[0] === "--" ? rawArgs.slice(1) : rawArgs;
	const globalOptions = parseGlobalCliOptions(args);
	const baseUrl = normalizeBaseUrl(globalOptions.baseUrl ?? DEFAULT_BASE_URL);

	const output = new Output({ plain: globalOptions.plain, color: globalOptions.color });
	const logger = createConsoleLogger({
		verbose: globalOptions.verbose,
		color: globalOptions.color,
	});
	const loadSelectors = () => SelectorStore.load({ file: globalOptions.selectorsFile });

	const connect: Connect = (task) =>
		withSession(
			requireCredentials(globalOptions),
			{
				headless: globalOptions.headless,
				timeoutMs: globalOptions.timeout,
				baseUrl,
				selectors: loadSelectors(),
				tunables: globalOptions.tunables,
				logger,
			},
			task,
		);

	const handlers = createHandlers({ connect, loadSelectors, output, baseUrl });
	const program = createProgram(handlers, readVersion(), (message) => output.error(message));

	await program.parseAsync(["node", "listharvest", ...args]);
}

export function isDirectExecution(
	moduleUrl: string,
	argvPath = process.argv[1],
): boolean {
	if (!argvPath) return false;

	try {
		const invokedPath = fs.realpathSync(argvPath);
		const modulePath = fs.realpathSync(fileURLToPath(moduleUrl));
		return invokedPath === modulePath;
	} catch {
		return false;
	}
}

if (process.argv[1]) {
	if (isDirectExecution(import.meta.url, process.argv[1])) {
		runCli().catch((error) => {
			const message = error instanceof Error ? error.message : String(error);
			console.error(message);
			process.exitCode = 1;
		});
	}
}
