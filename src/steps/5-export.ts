/**
 * Step 5: Export to CSV
 * Writes the leads matching the given filters to data/leads.csv
 */

import type { LeadStore } from "../db";
import type { Lead, LeadFilters } from "../types";
import * as fs from "fs";
import * as path from "path";

export const DEFAULT_CSV_PATH = path.join(process.cwd(), "data", "leads.csv");

const HEADERS = [
	"id",
	"platform",
	"author_name",
	"author_title",
	"author_company",
	"post_url",
	"content",
	"matched_keywords",
	"matched_job_titles",
	"matched_industries",
	"budget_mention",
	"lead_quality",
	"confidence",
	"relevance_rationale",
	"posted_at",
	"discovered_at",
	"dismissed",
];

const FORMULA_START = /^[=+\-@\t\r]/;
const NEEDS_QUOTES = /[",\n\r]/;

/**
 * One CSV field. Post text is untrusted, so anything a spreadsheet would run
 * as a formula is prefixed with an apostrophe before quoting.
 */
export function escapeCsv(value: string | null | undefined): string {
	if (!value) return "";
	const text = FORMULA_START.test(value) ? `'${value}` : value;
	return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvRow(lead: Lead): string {
	return [
		escapeCsv(lead.id),
		escapeCsv(lead.platform),
		escapeCsv(lead.author_name),
		escapeCsv(lead.author_title),
		escapeCsv(lead.author_company),
		escapeCsv(lead.post_url),
		escapeCsv(lead.content),
		escapeCsv(lead.matched_keywords.join("; ")),
		escapeCsv(lead.matched_job_titles.join("; ")),
		escapeCsv(lead.matched_industries.join("; ")),
		escapeCsv(lead.budget_mention),
		escapeCsv(lead.lead_quality),
		lead.confidence ?? "",
		escapeCsv(lead.relevance_rationale),
		escapeCsv(lead.posted_at),
		escapeCsv(lead.discovered_at),
		lead.dismissed ? "1" : "0",
	].join(",");
}

export async function runExport(
	store: LeadStore,
	filters: LeadFilters = {},
	csvPath: string = DEFAULT_CSV_PATH
): Promise<{ exported: number; path: string }> {
	console.log("\nExporting leads to CSV...");

	const leads = store.list(filters);
	fs.mkdirSync(path.dirname(csvPath), { recursive: true });

	const stream = fs.createWriteStream(csvPath);
	const finished = new Promise<void>((resolve, reject) => {
		stream.on("finish", resolve);
		stream.on("error", reject);
	});

	stream.write(HEADERS.join(",") + "\n");
	for (const lead of leads) {
		stream.write(toCsvRow(lead) + "\n");
	}
	stream.end();
	await finished;

	if (leads.length === 0) {
		console.log("  Nothing to export (header only)");
	} else {
		console.log(`  Exported ${leads.length} leads to ${csvPath}`);
	}

	return { exported: leads.length, path: csvPath };
}
