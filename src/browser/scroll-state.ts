/**
 * Per-call bookkeeping for one list extraction. The collected set only
 * grows and keeps first-discovery order.
 */
export class ScrollState {
	private readonly collected = new Set<string>();
	noGrowthStreak = 0;
	refreshAttempts = 0;
	iterations = 0;

	constructor(readonly startedAt: number) {}

	get size(): number {
		return this.collected.size;
	}

	/** Adds unseen handles and returns how many were new. */
	add(handles: Iterable<string>): number {
		const before = this.collected.size;
		for (const handle of handles) {
			this.collected.add(handle);
		}
		return this.collected.size - before;
	}

	recordGrowth(added: number): void {
		this.noGrowthStreak = added > 0 ? 0 : this.noGrowthStreak + 1;
	}

	elapsed(now: number): number {
		return now - this.startedAt;
	}

	deadlineExceeded(now: number, maxDurationMs?: number): boolean {
		if (maxDurationMs === undefined) return false;
		return this.elapsed(now) > maxDurationMs;
	}

	toArray(): string[] {
		return Array.from(this.collected);
	}
}
