import { Command } from "commander";
import type { CommandHandlers } from "../commands/handlers.js";
import { LoginError } from "../lib/errors.js";

export function registerGlobalOptions(program: Command): Command {
	return program
		.option("--username <name>", "Account username (or LISTHARVEST_USERNAME)")
		.option("--password <secret>", "Account password (or LISTHARVEST_PASSWORD)")
		.option("--base-url <url>", "Override the site base URL (for testing)")
		.option("--selectors <path>", "JSON5 file overriding selectors and keywords")
		.option("--timeout <ms>", "Page and element wait timeout in milliseconds")
		.option("--plain", "Plain output (no color)")
		.option("--no-color", "Disable ANSI colors")
		.option("--verbose", "Print debug log lines")
		.option("--no-headless", "Run browser in headed mode");
}

function addExtractionOptions(command: Command): Command {
	return command
		.option("--max-duration <ms>", "Stop scrolling after this many milliseconds")
		.option("--max-refresh-attempts <n>", "Times to reopen the list once it stops growing")
		.option("--wait-interval <ms>", "Pause after each settle-phase scroll")
		.option("--additional-scrolls <n>", "Settle-phase scroll cycles")
		.option("--pause <ms>", "Pause after each regular scroll")
		.option("--max-attempts <n>", "No-growth iterations before settling")
		.option("--json", "Output handles as JSON")
		.option("--json-full", "Output the full extraction result as JSON");
}

function describeError(error: unknown): string {
	if (error instanceof LoginError) return `${error.message} [${error.reason}]`;
	return error instanceof Error ? error.message : String(error);
}

export function run<TArgs extends unknown[]>(
	action: (...args: TArgs) => Promise<void>,
	onError: (message: string) => void = (message) => console.error(message),
) {
	return async (...args: TArgs) => {
		try {
			await action(...args);
		} catch (error) {
			onError(describeError(error));
			process.exitCode = 1;
		}
	};
}

export function createProgram(
	handlers: CommandHandlers,
	version = "0.1.0",
	onError?: (message: string) => void,
): Command {
	const program = new Command();

	program
		.name("listharvest")
		.description("Sign in with a browser and collect follower and following lists")
		.version(version)
		.showHelpAfterError("(run with --help for usage)");
	registerGlobalOptions(program);

	addExtractionOptions(
		program.command("followers <profile>").description("List the accounts following a profile"),
	).action(
		run(
			(profile: string, options: unknown) => handlers.followers(profile, options),
			onError,
		),
	);

	addExtractionOptions(
		program.command("following <profile>").description("List the accounts a profile follows"),
	).action(
		run(
			(profile: string, options: unknown) => handlers.following(profile, options),
			onError,
		),
	);

	program
		.command("count <profile>")
		.description("Read the follower or following total shown on a profile")
		.option("--kind <kind>", "followers or following", "followers")
		.option("--json", "Output as JSON")
		.action(
			run((profile: string, options: unknown) => handlers.count(profile, options), onError),
		);

	program
		.command("check")
		.description("Sign in and report the session state")
		.action(run(() => handlers.check(), onError));

	program
		.command("selectors")
		.description("Validate and print the selector and keyword configuration")
		.option("--json", "Output as JSON")
		.action(run((options: unknown) => handlers.selectors(options), onError));

	return program;
}
