import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Scheduler } from "./scheduler";
import type { RunSummary } from "./types";

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
	return {
		keywordsProcessed: 1,
		candidatesFetched: 0,
		candidatesFilteredOut: 0,
		candidatesClassified: 0,
		candidatesRejected: 0,
		leadsCreated: 0,
		duplicates: 0,
		errors: [],
		aborted: false,
		startedAt: "2026-10-18T12:00:00.000Z",
		finishedAt: "2026-10-18T12:00:01.000Z",
		...overrides,
	};
}

function deferred(): { promise: Promise<RunSummary>; resolve: (value: RunSummary) => void } {
	let resolve: (value: RunSummary) => void = () => undefined;
	const promise = new Promise<RunSummary>(r => {
		resolve = r;
	});
	return { promise, resolve };
}

/** Task whose first run stays in flight until `first` settles. */
function heldFirstRun(first: Promise<RunSummary>) {
	let calls = 0;
	return vi.fn(() => {
		calls++;
		return calls === 1 ? first : Promise.resolve(summary());
	});
}

describe("Scheduler", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.setSystemTime(new Date("2026-10-18T12:00:00.000Z"));
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("runs immediately on start and then every interval", async () => {
		const task = vi.fn(async () => summary());
		const scheduler = new Scheduler(task);

		scheduler.start(1000);
		await vi.advanceTimersByTimeAsync(0);
		expect(task).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(3000);
		expect(task).toHaveBeenCalledTimes(4);

		const state = scheduler.getState();
		expect(state.active).toBe(true);
		expect(state.intervalMs).toBe(1000);
		expect(state.lastRunStatus).toBe("success");
		expect(state.nextRunAt).toBe("2026-10-18T12:00:04.000Z");
		scheduler.stop();
	});

	it("fires nothing further after stop", async () => {
		const task = vi.fn(async () => summary());
		const scheduler = new Scheduler(task);

		scheduler.start(1000);
		await vi.advanceTimersByTimeAsync(0);
		scheduler.stop();
		await vi.advanceTimersByTimeAsync(5000);

		expect(task).toHaveBeenCalledTimes(1);
		expect(scheduler.getState()).toMatchObject({ active: false, nextRunAt: null });
	});

	it("drops a scheduled run still waiting in the queue when stopped", async () => {
		const first = deferred();
		const task = heldFirstRun(first.promise);
		const scheduler = new Scheduler(task);

		scheduler.start(1000);
		await vi.advanceTimersByTimeAsync(1000);
		expect(scheduler.getState()).toMatchObject({ running: true, queued: 1 });

		scheduler.stop();
		first.resolve(summary());
		await scheduler.idle();

		expect(task).toHaveBeenCalledTimes(1);
		expect(scheduler.getState().queued).toBe(0);
	});

	it("still runs a manual trigger queued before stop", async () => {
		const first = deferred();
		const task = heldFirstRun(first.promise);
		const scheduler = new Scheduler(task);

		scheduler.start(1000);
		await vi.advanceTimersByTimeAsync(0);
		const manual = scheduler.runOnce();
		scheduler.stop();
		first.resolve(summary());
		await manual;

		expect(task).toHaveBeenCalledTimes(2);
	});

	it("keeps at most one scheduled run pending while a run overruns", async () => {
		const first = deferred();
		const task = heldFirstRun(first.promise);
		const scheduler = new Scheduler(task);

		scheduler.start(1000);
		await vi.advanceTimersByTimeAsync(10_000);

		expect(task).toHaveBeenCalledTimes(1);
		expect(scheduler.getState().queued).toBe(1);

		first.resolve(summary());
		await vi.advanceTimersByTimeAsync(0);

		expect(task).toHaveBeenCalledTimes(2);
		expect(scheduler.getState()).toMatchObject({ running: false, queued: 0 });
		scheduler.stop();
	});

	it("restarts with the new interval when started again", async () => {
		const task = vi.fn(async () => summary());
		const scheduler = new Scheduler(task);

		scheduler.start(10_000);
		await vi.advanceTimersByTimeAsync(0);
		scheduler.start(1000);
		await vi.advanceTimersByTimeAsync(1000);

		expect(task).toHaveBeenCalledTimes(3);
		expect(scheduler.getState().intervalMs).toBe(1000);
		scheduler.stop();
	});

	it("rejects a non-positive interval", () => {
		const scheduler = new Scheduler(async () => summary());
		expect(() => scheduler.start(0)).toThrow(RangeError);
		expect(scheduler.active).toBe(false);
	});

	it("runOnce leaves an idle scheduler idle", async () => {
		const scheduler = new Scheduler(async () => summary({ leadsCreated: 2 }));

		const result = await scheduler.runOnce();

		expect(result.leadsCreated).toBe(2);
		expect(scheduler.getState()).toMatchObject({
			active: false,
			intervalMs: null,
			running: false,
			lastRunStatus: "success",
			lastRunAt: "2026-10-18T12:00:00.000Z",
		});
		expect(scheduler.getState().lastSummary?.leadsCreated).toBe(2);
	});

	it("queues a trigger that arrives during a run instead of overlapping", async () => {
		const first = deferred();
		let started = 0;
		let running = 0;
		let maxRunning = 0;
		const task = vi.fn(async () => {
			started++;
			running++;
			maxRunning = Math.max(maxRunning, running);
			const result = started === 1 ? await first.promise : summary();
			running--;
			return result;
		});
		const scheduler = new Scheduler(task);

		const a = scheduler.runOnce();
		const b = scheduler.runOnce();
		await vi.advanceTimersByTimeAsync(0);

		expect(task).toHaveBeenCalledTimes(1);
		expect(scheduler.getState()).toMatchObject({ running: true, queued: 1 });

		first.resolve(summary());
		await Promise.all([a, b]);

		expect(task).toHaveBeenCalledTimes(2);
		expect(maxRunning).toBe(1);
		expect(scheduler.getState()).toMatchObject({ running: false, queued: 0 });
	});

	it("records a failed run and keeps the schedule going", async () => {
		const task = vi.fn(async () => summary());
		task.mockRejectedValueOnce(new Error("disk full"));
		const onRunEnd = vi.fn();
		const scheduler = new Scheduler(task, { onRunEnd });

		scheduler.start(1000);
		await vi.advanceTimersByTimeAsync(0);

		expect(scheduler.getState().lastRunStatus).toBe("error: disk full");
		expect(onRunEnd).toHaveBeenLastCalledWith("scheduled", new Error("disk full"));

		await vi.advanceTimersByTimeAsync(1000);
		expect(scheduler.getState().lastRunStatus).toBe("success");
		scheduler.stop();
	});

	it("marks an aborted run", async () => {
		const scheduler = new Scheduler(async () => summary({ aborted: true }));
		await scheduler.runOnce();
		expect(scheduler.getState().lastRunStatus).toBe("aborted");
	});

	it("idle waits for queued runs", async () => {
		const first = deferred();
		const scheduler = new Scheduler(() => first.promise);
		const run = scheduler.runOnce();
		let settled = false;
		const idle = scheduler.idle().then(() => {
			settled = true;
		});

		await vi.advanceTimersByTimeAsync(0);
		expect(settled).toBe(false);

		first.resolve(summary());
		await Promise.all([run, idle]);
		expect(settled).toBe(true);
	});
});
