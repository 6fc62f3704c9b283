import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { syncMonitoring } from "./daemon";
import { Scheduler } from "./scheduler";
import type { RunSummary } from "./types";

const HOUR_MS = 60 * 60 * 1000;

const emptySummary: RunSummary = {
	keywordsProcessed: 0,
	candidatesFetched: 0,
	candidatesFilteredOut: 0,
	candidatesClassified: 0,
	candidatesRejected: 0,
	leadsCreated: 0,
	duplicates: 0,
	errors: [],
	aborted: false,
	startedAt: "",
	finishedAt: "",
};

describe("syncMonitoring", () => {
	let scheduler: Scheduler;

	beforeEach(() => {
		vi.useFakeTimers();
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		scheduler = new Scheduler(async () => emptySummary);
	});

	afterEach(() => {
		scheduler.stop();
		vi.restoreAllMocks();
		vi.useRealTimers();
	});

	it("starts the scheduler when monitoring is switched on", () => {
		syncMonitoring(scheduler, { active: true, interval_hours: 2 }, null);

		expect(scheduler.getState()).toMatchObject({ active: true, intervalMs: 2 * HOUR_MS });
	});

	it("leaves a running scheduler alone when nothing changed", () => {
		const settings = { active: true, interval_hours: 2 };
		syncMonitoring(scheduler, settings, null);
		const start = vi.spyOn(scheduler, "start");

		syncMonitoring(scheduler, { ...settings }, settings);

		expect(start).not.toHaveBeenCalled();
	});

	it("restarts on an interval change", () => {
		const previous = syncMonitoring(scheduler, { active: true, interval_hours: 2 }, null);

		syncMonitoring(scheduler, { active: true, interval_hours: 6 }, previous);

		expect(scheduler.getState().intervalMs).toBe(6 * HOUR_MS);
	});

	it("stops the scheduler when monitoring is paused", () => {
		const previous = syncMonitoring(scheduler, { active: true, interval_hours: 1 }, null);

		syncMonitoring(scheduler, { active: false, interval_hours: 1 }, previous);

		expect(scheduler.active).toBe(false);
	});

	it("does nothing while paused and idle", () => {
		const start = vi.spyOn(scheduler, "start");
		syncMonitoring(scheduler, { active: false, interval_hours: 1 }, null);
		expect(start).not.toHaveBeenCalled();
		expect(scheduler.active).toBe(false);
	});
});
