import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadEnv } from "./env";

describe("loadEnv", () => {
	let dir: string;
	const keys = ["LM_TEST_TOKEN", "LM_TEST_QUOTED", "LM_TEST_EXPORTED", "LM_TEST_EXISTING"];

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "lead-env-"));
		for (const key of keys) delete process.env[key];
	});

	afterEach(() => {
		for (const key of keys) delete process.env[key];
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("loads pairs, strips quotes and export prefixes, and keeps existing values", () => {
		const file = path.join(dir, ".env");
		fs.writeFileSync(file, [
			"# comment",
			"LM_TEST_TOKEN=test-secret",
			'LM_TEST_QUOTED="two words"',
			"export LM_TEST_EXPORTED=yes",
			"LM_TEST_EXISTING=from-file",
			"not a pair",
		].join("\n"));
		process.env.LM_TEST_EXISTING = "from-shell";

		loadEnv(file);

		expect(process.env.LM_TEST_TOKEN).toBe("test-secret");
		expect(process.env.LM_TEST_QUOTED).toBe("two words");
		expect(process.env.LM_TEST_EXPORTED).toBe("yes");
		expect(process.env.LM_TEST_EXISTING).toBe("from-shell");
	});

	it("ignores a missing file", () => {
		expect(() => loadEnv(path.join(dir, "missing.env"))).not.toThrow();
	});
});
