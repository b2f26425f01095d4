import kleur from "kleur";
import type { SelectorSnapshot } from "./selectors.js";
import type { CountResult, ExtractionResult, SessionStatus } from "./types.js";

interface OutputConfig {
	plain?: boolean;
	color?: boolean;
	write?: (line: string) => void;
	writeError?: (line: string) => void;
}

function paint(enabled: boolean) {
	if (!enabled) {
		return {
			title: (v: string) => v,
			key: (v: string) => v,
			muted: (v: string) => v,
			success: (v: string) => v,
			warning: (v: string) => v,
			error: (v: string) => v,
		};
	}

	return {
		title: (v: string) => kleur.bold().cyan(v),
		key: (v: string) => kleur.bold(v),
		muted: (v: string) => kleur.gray(v),
		success: (v: string) => kleur.green(v),
		warning: (v: string) => kleur.yellow(v),
		error: (v: string) => kleur.red(v),
	};
}

export class Output {
	private readonly c: ReturnType<typeof paint>;
	private readonly write: (line: string) => void;
	private readonly writeError: (line: string) => void;

	constructor(cfg: OutputConfig) {
		this.c = paint((cfg.plain ? false : cfg.color) !== false);
		this.write = cfg.write ?? ((line) => console.log(line));
		this.writeError = cfg.writeError ?? ((line) => console.error(line));
	}

	warn(message: string): void {
		this.writeError(this.c.warning(message));
	}

	info(message: string): void {
		this.write(message);
	}

	error(message: string): void {
		this.writeError(this.c.error(message));
	}

	json(value: unknown): void {
		this.write(JSON.stringify(value, null, 2));
	}

	handles(result: ExtractionResult): void {
		if (result.handles.length === 0) {
			this.write(this.c.muted(`No ${result.kind} found for @${result.profile}.`));
		} else {
			for (const handle of result.handles) this.write(handle);
		}

		const expected = result.expectedCount === null ? "?" : String(result.expectedCount);
		this.write(
			this.c.muted(
				`${result.handles.length}/${expected} ${result.kind} • ${result.stopReason} • ${result.elapsedMs}ms`,
			),
		);
		if (result.stopReason === "unavailable") {
			this.warn(`The ${result.kind} list of @${result.profile} could not be opened.`);
		}
	}

	count(result: CountResult): void {
		if (result.count === null) {
			this.warn(`No ${result.kind} count shown for @${result.profile}.`);
			return;
		}
		this.write(`${this.c.key(`@${result.profile}`)} ${result.kind}: ${result.count}`);
	}

	status(status: SessionStatus): void {
		const painter = status.state === "Authenticated" ? this.c.success : this.c.error;
		this.write(`${this.c.key("Session")}: ${painter(status.state)}`);
		this.write(`${this.c.key("Base URL")}: ${status.baseUrl}`);
	}

	selectors(snapshot: SelectorSnapshot): void {
		this.write(this.c.title("Selectors"));
		for (const [name, locator] of Object.entries(snapshot.selectors)) {
			this.write(`${this.c.key(name)}: ${locator}`);
		}
		this.write("");
		this.write(this.c.title(`Keywords (${snapshot.keywordMatch})`));
		for (const [group, words] of Object.entries(snapshot.keywords)) {
			this.write(`${this.c.key(group)}: ${words.join(", ")}`);
		}
		this.write("");
		this.write(this.c.muted(`Sources: ${snapshot.sources.join(", ")}`));
	}
}
