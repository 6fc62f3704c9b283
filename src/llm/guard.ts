import { AdapterUnavailableError } from "../errors";
import { createLog } from "../log";

const log = createLog("llm-errors.log");

export interface GuardLimits {
	maxConsecutiveFailures: number;
	dailyLimit: number;
}

export interface ClassifierUsage {
	date: string;
	dailyCalls: number;
	dailyLimit: number;
	consecutiveFailures: number;
	breakerOpen: boolean;
}

function localDate(date: Date): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Circuit breaker and daily budget for classifier calls.
 * One instance per process; the breaker closes again at the start of the next run.
 */
export class ClassifierGuard {
	private date: string;
	private dailyCalls = 0;
	private consecutiveFailures = 0;

	constructor(
		private readonly limits: GuardLimits,
		private readonly now: () => Date = () => new Date()
	) {
		this.date = localDate(now());
	}

	get breakerOpen(): boolean {
		return this.consecutiveFailures >= this.limits.maxConsecutiveFailures;
	}

	/** Counts the call and returns null, or returns why it may not be made. */
	check(): AdapterUnavailableError | null {
		const today = localDate(this.now());
		if (today !== this.date) {
			this.date = today;
			this.dailyCalls = 0;
			log.info(`Reset daily classifier call count for ${today}`);
		}

		if (this.dailyCalls >= this.limits.dailyLimit) {
			return new AdapterUnavailableError("classifier", `daily call limit reached (${this.dailyCalls}/${this.limits.dailyLimit})`);
		}
		if (this.breakerOpen) {
			return new AdapterUnavailableError("classifier", `circuit breaker open after ${this.consecutiveFailures} consecutive failures`);
		}

		this.dailyCalls++;
		if (this.dailyCalls % 100 === 0) {
			log.info(`Classifier calls today: ${this.dailyCalls}/${this.limits.dailyLimit}`);
		}
		return null;
	}

	record(ok: boolean): void {
		if (ok) {
			this.consecutiveFailures = 0;
			return;
		}
		this.consecutiveFailures++;
		log.warn(`Classifier failure recorded. Count: ${this.consecutiveFailures}/${this.limits.maxConsecutiveFailures}`);
	}

	resetBreaker(): void {
		this.consecutiveFailures = 0;
	}

	usage(): ClassifierUsage {
		return {
			date: this.date,
			dailyCalls: this.dailyCalls,
			dailyLimit: this.limits.dailyLimit,
			consecutiveFailures: this.consecutiveFailures,
			breakerOpen: this.breakerOpen,
		};
	}
}
