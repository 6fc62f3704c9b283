import * as fs from "fs";
import * as path from "path";

const DATA_DIR = path.join(process.cwd(), "data");

let fileLogging = process.env.NODE_ENV !== "test" && process.env.VITEST === undefined;

export interface Log {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

function append(file: string, level: string, message: string): void {
	if (!fileLogging) return;
	const line = `[${new Date().toISOString()}] ${level} ${message}\n`;
	try {
		fs.mkdirSync(DATA_DIR, { recursive: true });
		fs.appendFileSync(path.join(DATA_DIR, file), line);
	} catch (err) {
		fileLogging = false;
		console.error(`  Log file ${file} not writable, logging to console only:`, err);
	}
}

/**
 * Console logger that mirrors every line into data/<file>.
 * Progress goes to stdout, warnings and errors to stderr.
 */
export function createLog(file: string): Log {
	return {
		info(message) {
			console.log(message);
			append(file, "INFO", message.trim());
		},
		warn(message) {
			console.warn(message);
			append(file, "WARN", message.trim());
		},
		error(message) {
			console.error(message);
			append(file, "ERROR", message.trim());
		},
	};
}
