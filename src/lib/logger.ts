import kleur from "kleur";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

/**
 * Observability sink handed to the session, the login flow and the list
 * extractor. Callers supply their own; the library default is silent.
 */
export interface Logger {
	debug(message: string, fields?: LogFields): void;
	info(message: string, fields?: LogFields): void;
	warn(message: string, fields?: LogFields): void;
	error(message: string, fields?: LogFields): void;
}

export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

export interface ConsoleLoggerConfig {
	verbose?: boolean;
	color?: boolean;
	write?: (line: string) => void;
}

function paint(enabled: boolean): Record<LogLevel, (v: string) => string> {
	if (!enabled) {
		return {
			debug: (v) => v,
			info: (v) => v,
			warn: (v) => v,
			error: (v) => v,
		};
	}

	return {
		debug: (v) => kleur.gray(v),
		info: (v) => kleur.cyan(v),
		warn: (v) => kleur.yellow(v),
		error: (v) => kleur.red(v),
	};
}

export function formatFields(fields?: LogFields): string {
	if (!fields) return "";
	const parts = Object.entries(fields)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${value}`);
	return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
	const c = paint(config.color !== false);
	const write = config.write ?? ((line: string) => console.error(line));

	const emit = (level: LogLevel, message: string, fields?: LogFields) => {
		if (level === "debug" && !config.verbose) return;
		const label = c[level](level.toUpperCase().padEnd(5));
		write(`[listharvest] ${label} ${message}${formatFields(fields)}`);
	};

	return {
		debug: (message, fields) => emit("debug", message, fields),
		info: (message, fields) => emit("info", message, fields),
		warn: (message, fields) => emit("warn", message, fields),
		error: (message, fields) => emit("error", message, fields),
	};
}
