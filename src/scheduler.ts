import { errorMessage } from "./errors";
import type { RunSummary } from "./types";

export type RunTask = () => Promise<RunSummary>;

export type RunTrigger = "scheduled" | "manual";

export interface MonitorState {
	active: boolean;
	intervalMs: number | null;
	running: boolean;
	queued: number;
	lastRunAt: string | null;
	lastRunStatus: string;
	lastSummary: RunSummary | null;
	nextRunAt: string | null;
}

export interface SchedulerOptions {
	onRunStart?: (trigger: RunTrigger) => void;
	onRunEnd?: (trigger: RunTrigger, result: RunSummary | Error) => void;
}

/**
 * Idle/Active state machine around a run task. Every run, scheduled or manual,
 * goes through one queue, so two runs never interleave. Manual triggers always
 * wait their turn; scheduled ticks coalesce into a single pending run.
 */
export class Scheduler {
	private readonly state: MonitorState = {
		active: false,
		intervalMs: null,
		running: false,
		queued: 0,
		lastRunAt: null,
		lastRunStatus: "Not started",
		lastSummary: null,
		nextRunAt: null,
	};
	private timer: ReturnType<typeof setTimeout> | null = null;
	private queue: Promise<unknown> = Promise.resolve();
	private scheduledPending = false;

	constructor(
		private readonly task: RunTask,
		private readonly options: SchedulerOptions = {}
	) {}

	getState(): MonitorState {
		return { ...this.state };
	}

	get active(): boolean {
		return this.state.active;
	}

	/** Idle → Active. Fires a run now, then every intervalMs. Restarts if already active. */
	start(intervalMs: number): void {
		if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
			throw new RangeError(`interval must be a positive number of milliseconds, got ${intervalMs}`);
		}
		this.clearTimer();
		this.state.active = true;
		this.state.intervalMs = intervalMs;
		this.tick();
	}

	/** Active → Idle. A run in flight still completes; a queued scheduled run is dropped. */
	stop(): void {
		this.clearTimer();
		this.state.active = false;
		this.state.nextRunAt = null;
	}

	/** Manual trigger; leaves the schedule untouched. */
	runOnce(): Promise<RunSummary> {
		return this.enqueue("manual");
	}

	/** Resolves once every run queued so far has finished. */
	async idle(): Promise<void> {
		await this.queue;
	}

	private tick(): void {
		if (!this.state.active || this.state.intervalMs === null) return;

		const intervalMs = this.state.intervalMs;
		this.timer = setTimeout(() => this.tick(), intervalMs);
		this.state.nextRunAt = new Date(Date.now() + intervalMs).toISOString();

		// At most one scheduled run waits in the queue; later ticks fold into it
		if (this.scheduledPending) return;
		this.scheduledPending = true;
		this.state.queued++;
		this.queue = this.queue.then(async () => {
			this.scheduledPending = false;
			if (!this.state.active) {
				this.state.queued--;
				return;
			}
			// Failures are already recorded in the state by execute
			await this.execute("scheduled").catch(() => undefined);
		});
	}

	private enqueue(trigger: RunTrigger): Promise<RunSummary> {
		this.state.queued++;
		const run = this.queue.then(() => this.execute(trigger));
		this.queue = run.catch(() => undefined);
		return run;
	}

	private async execute(trigger: RunTrigger): Promise<RunSummary> {
		this.state.queued--;
		this.state.running = true;
		this.state.lastRunAt = new Date().toISOString();
		this.options.onRunStart?.(trigger);

		try {
			const summary = await this.task();
			this.state.lastSummary = summary;
			this.state.lastRunStatus = summary.aborted ? "aborted" : "success";
			this.options.onRunEnd?.(trigger, summary);
			return summary;
		} catch (err) {
			this.state.lastRunStatus = `error: ${errorMessage(err)}`;
			this.options.onRunEnd?.(trigger, err instanceof Error ? err : new Error(errorMessage(err)));
			throw err;
		} finally {
			this.state.running = false;
		}
	}

	private clearTimer(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}
}
