/**
 * Scheduler daemon
 * Runs the pipeline every monitoring.interval_hours while monitoring.active is true.
 * The config is re-read every minute, so `npm run monitor -- start|stop`
 * takes effect without a restart.
 *
 * Usage: npm run daemon [-- --run-now]
 */

import { configPath, loadConfig } from "./config";
import { SqliteLeadStore } from "./db";
import { loadEnv } from "./env";
import { errorMessage } from "./errors";
import { createLog } from "./log";
import { classifierGuard, createDeps, runPipeline } from "./pipeline";
import { Scheduler } from "./scheduler";
import type { MonitoringSettings } from "./types";
import { formatDuration } from "./utils";

const CONFIG_POLL_MS = 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

const log = createLog("daemon.log");

/**
 * Brings the scheduler in line with the persisted monitoring settings.
 * Returns the settings it acted on.
 */
export function syncMonitoring(
	scheduler: Scheduler,
	monitoring: MonitoringSettings,
	previous: MonitoringSettings | null
): MonitoringSettings {
	const intervalChanged = previous !== null && previous.interval_hours !== monitoring.interval_hours;

	if (monitoring.active && (!scheduler.active || intervalChanged)) {
		log.info(`Monitoring active: running every ${monitoring.interval_hours} hour(s)`);
		scheduler.start(monitoring.interval_hours * HOUR_MS);
	} else if (!monitoring.active && scheduler.active) {
		log.info("Monitoring paused");
		scheduler.stop();
	}
	return monitoring;
}

async function main(): Promise<void> {
	loadEnv();
	const file = configPath();
	const initial = loadConfig(file);
	const store = new SqliteLeadStore({ path: process.env.LEADS_DB_PATH || undefined });

	// The classifier budget spans runs; limits come from the startup config
	const guard = classifierGuard(initial);

	// Each run reads a fresh config snapshot
	const scheduler = new Scheduler(
		async () => {
			const config = loadConfig(file);
			return runPipeline(config, createDeps(config, store, guard));
		},
		{
			onRunStart: (trigger) => {
				log.info("\n" + "=".repeat(50));
				log.info(`[${new Date().toISOString()}] Starting ${trigger} run...`);
			},
			onRunEnd: (_trigger, result) => {
				if (result instanceof Error) {
					log.error(`Run failed: ${result.message}`);
					return;
				}
				const next = scheduler.getState().nextRunAt;
				if (next) {
					log.info(`Next run: ${new Date(next).toLocaleString()} (in ${formatDuration(Date.parse(next) - Date.now())})`);
				}
			},
		}
	);

	log.info("=".repeat(50));
	log.info("Lead Monitor Daemon Started");
	log.info("=".repeat(50));
	log.info(`Config: ${file}`);
	log.info(`Interval: every ${initial.monitoring.interval_hours} hour(s)`);
	log.info(`Monitoring: ${initial.monitoring.active ? "Active" : "Paused"}`);
	log.info("\nPress Ctrl+C to stop\n");

	if (process.argv.includes("--run-now") && !initial.monitoring.active) {
		// onRunEnd already logged the failure; keep the daemon alive
		await scheduler.runOnce().catch(() => undefined);
	}

	let current = syncMonitoring(scheduler, initial.monitoring, null);

	const poll = setInterval(() => {
		try {
			current = syncMonitoring(scheduler, loadConfig(file).monitoring, current);
		} catch (err) {
			log.error(`Config reload failed, keeping previous settings: ${errorMessage(err)}`);
		}
	}, CONFIG_POLL_MS);

	const shutdown = async (): Promise<void> => {
		clearInterval(poll);
		scheduler.stop();
		log.info("\nDaemon stopping, waiting for the current run to finish...");
		await scheduler.idle();
		store.close();
		log.info("Daemon stopped");
		process.exit(0);
	};

	process.on("SIGINT", () => void shutdown());
	process.on("SIGTERM", () => void shutdown());
}

if (import.meta.url === `file://${process.argv[1]}`) {
	main().catch((err) => {
		console.error("Daemon failed:", errorMessage(err));
		process.exit(1);
	});
}
