/**
 * Monitoring control
 *
 * Usage:
 *   npm run monitor -- status
 *   npm run monitor -- start [interval_hours]
 *   npm run monitor -- stop
 *   npm run monitor -- run-once
 */

import { configPath, loadConfig, setMonitoring } from "./config";
import { SqliteLeadStore } from "./db";
import { loadEnv } from "./env";
import { errorMessage } from "./errors";
import { createDeps, runPipeline } from "./pipeline";

function usage(): never {
	console.log("Usage: npm run monitor -- <status|start [hours]|stop|run-once>");
	process.exit(1);
}

async function main(): Promise<void> {
	loadEnv();
	const file = configPath();
	const [command, arg] = process.argv.slice(2);

	switch (command) {
		case "status": {
			const { monitoring, search, keywords } = loadConfig(file);
			console.log(`Monitoring: ${monitoring.active ? "Active" : "Paused"}`);
			console.log(`Interval:   every ${monitoring.interval_hours} hour(s)`);
			console.log(`Provider:   ${search.provider} (${keywords.length} keywords)`);
			return;
		}
		case "start": {
			const hours = arg !== undefined ? parseFloat(arg) : undefined;
			if (hours !== undefined && !(hours > 0)) {
				console.error(`Invalid interval: ${arg}`);
				process.exit(1);
			}
			setMonitoring(file, { active: true, intervalHours: hours });
			const { monitoring } = loadConfig(file);
			console.log(`Monitoring enabled: every ${monitoring.interval_hours} hour(s)`);
			console.log("The daemon (npm run daemon) picks this up within a minute.");
			return;
		}
		case "stop":
			loadConfig(file);
			setMonitoring(file, { active: false });
			console.log("Monitoring disabled");
			return;
		case "run-once": {
			const config = loadConfig(file);
			const store = new SqliteLeadStore({ path: process.env.LEADS_DB_PATH || undefined });
			try {
				// Outside the daemon queue; a concurrent insert of the same lead is a no-op in the store
				const summary = await runPipeline(config, createDeps(config, store));
				console.log(JSON.stringify(summary, null, 2));
			} finally {
				store.close();
			}
			return;
		}
		default:
			usage();
	}
}

if (import.meta.url === `file://${process.argv[1]}`) {
	main().catch((err) => {
		console.error("Monitor command failed:", errorMessage(err));
		process.exit(1);
	});
}
