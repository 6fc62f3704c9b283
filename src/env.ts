import * as fs from "fs";
import * as path from "path";

/**
 * Loads KEY=value pairs from a .env file (default: current working directory)
 * into process.env. Existing variables win; matching surrounding quotes are stripped.
 */
export function loadEnv(envPath: string = path.join(process.cwd(), ".env")): void {
	if (!fs.existsSync(envPath)) return;

	const envContent = fs.readFileSync(envPath, "utf-8");
	for (const line of envContent.split(/\r?\n/)) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) continue;

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) continue;

		const key = trimmed.slice(0, eqIndex).replace(/^export\s+/, "").trim();
		let value = trimmed.slice(eqIndex + 1).trim();
		if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
			value = value.slice(1, -1);
		}
		if (key && !process.env[key]) {
			process.env[key] = value;
		}
	}
}
