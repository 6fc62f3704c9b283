import * as fs from "fs";
import * as path from "path";
import * as yaml from "yaml";
import { z } from "zod";
import { ConfigInvalidError, errorMessage } from "./errors";
import type { Config } from "./types";

export const DEFAULT_CONFIG_PATH = path.join(process.cwd(), "config", "config.yaml");

export function configPath(): string {
	return process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
}

/** Strips the double quotes that mark a keyword as an exact phrase. */
export function phraseOf(keyword: string): string {
	return keyword.trim().replace(/^"+|"+$/g, "").trim();
}

const keywordSchema = z.string().superRefine((keyword, ctx) => {
	const phrase = phraseOf(keyword);
	if (phrase.length < 3) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `keyword '${keyword}' is too short (minimum 3 characters)` });
	}
	if (phrase.length > 100) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `keyword '${keyword}' is too long (maximum 100 characters)` });
	}
});

const termList = z.array(z.string().trim().min(1)).default([]);

const configSchema: z.ZodType<Config, z.ZodTypeDef, unknown> = z.object({
	profile: z.string().default("a PR agency looking for brands that need PR support"),
	keywords: z.array(keywordSchema).min(1, "at least one keyword is required"),
	job_titles: termList,
	industries: termList,
	search: z.object({
		provider: z.enum(["linkedin", "twitter"]).default("linkedin"),
		results_per_keyword: z.number().int().min(1).max(50),
		date_filter: z.enum(["past-24h", "past-week", "past-month"]),
		sort_type: z.enum(["date_posted", "relevance"]),
		use_job_title_filter: z.boolean().default(true),
		timeout_seconds: z.number().positive().default(120),
	}),
	classifier: z.object({
		timeout_seconds: z.number().positive().default(60),
		max_consecutive_failures: z.number().int().positive().default(5),
		daily_limit: z.number().int().positive().default(1000),
	}).default({}),
	monitoring: z.object({
		active: z.boolean().default(false),
		interval_hours: z.number().positive().default(1),
	}).default({}),
});

/** Validates an already-parsed document. Throws ConfigInvalidError listing every problem. */
export function parseConfig(raw: unknown): Config {
	const result = configSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigInvalidError(
			result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		);
	}
	return result.data;
}

export function loadConfig(file: string = configPath()): Config {
	let content: string;
	try {
		content = fs.readFileSync(file, "utf-8");
	} catch (err) {
		throw new ConfigInvalidError([`cannot read ${file}: ${errorMessage(err)}`]);
	}

	let raw: unknown;
	try {
		raw = yaml.parse(content);
	} catch (err) {
		throw new ConfigInvalidError([`invalid YAML in ${file}: ${errorMessage(err)}`]);
	}
	return parseConfig(raw);
}

/**
 * Persists the monitoring section, leaving the rest of the document
 * (comments included) untouched.
 */
export function setMonitoring(file: string, monitoring: { active: boolean; intervalHours?: number }): void {
	const doc = yaml.parseDocument(fs.readFileSync(file, "utf-8"));
	doc.setIn(["monitoring", "active"], monitoring.active);
	if (monitoring.intervalHours !== undefined) {
		doc.setIn(["monitoring", "interval_hours"], monitoring.intervalHours);
	}
	fs.writeFileSync(file, doc.toString());
}
