/**
 * Lead viewer CLI
 *
 * Usage:
 *   npm run leads                                  # 20 most recent visible leads
 *   npm run leads -- --keyword="PR agency" --limit=50
 *   npm run leads -- --title=CMO --industry=Beauty --search=launch
 *   npm run leads -- --all                         # include dismissed
 *   npm run leads -- dismiss <lead id>
 *   npm run leads -- stats
 *   npm run leads -- export [filters]              # data/leads.csv
 */

import { SqliteLeadStore } from "./db";
import { loadEnv } from "./env";
import { errorMessage } from "./errors";
import { runExport } from "./steps/5-export";
import type { Lead, LeadFilters, Platform } from "./types";
import { truncate } from "./utils";

function flag(args: string[], name: string): string | undefined {
	const arg = args.find(a => a.startsWith(`--${name}=`));
	return arg ? arg.slice(name.length + 3).replace(/^"|"$/g, "") : undefined;
}

export function parseFilters(args: string[]): LeadFilters {
	const platform = flag(args, "platform");
	const limit = parseInt(flag(args, "limit") ?? "", 10);
	return {
		keyword: flag(args, "keyword"),
		jobTitle: flag(args, "title"),
		industry: flag(args, "industry"),
		text: flag(args, "search"),
		platform: platform === "linkedin" || platform === "twitter" ? platform : undefined,
		includeDismissed: args.includes("--all"),
		limit: Number.isNaN(limit) ? undefined : limit,
	};
}

/** Link to the author's profile: the stored one, else built from platform and handle. */
export function profileUrl(lead: Pick<Lead, "platform" | "author_handle" | "author_profile_url">): string | null {
	if (lead.author_profile_url) return lead.author_profile_url;
	if (!lead.author_handle) return null;
	const handle = lead.author_handle.replace(/^@/, "");
	const base: Record<Platform, string> = {
		linkedin: "https://www.linkedin.com/in/",
		twitter: "https://x.com/",
	};
	return base[lead.platform] + encodeURIComponent(handle);
}

function printLead(lead: Lead, index: number): void {
	const quality = lead.lead_quality ? ` [${lead.lead_quality}]` : "";
	console.log(`\n${index}. ${lead.author_name || "Unknown"}${quality}${lead.dismissed ? " (dismissed)" : ""}`);
	if (lead.author_title) console.log(`   ${truncate(lead.author_title, 80)}`);
	if (lead.author_company) console.log(`   Company: ${lead.author_company}`);
	console.log(`   ${truncate(lead.content.replace(/\s+/g, " "), 200)}`);
	if (lead.budget_mention) console.log(`   Budget: ${lead.budget_mention}`);
	console.log(`   Keywords: ${lead.matched_keywords.join(", ") || "-"} | Roles: ${lead.matched_job_titles.join(", ") || "-"} | Industries: ${lead.matched_industries.join(", ") || "-"}`);
	console.log(`   Post: ${lead.post_url}`);
	const profile = profileUrl(lead);
	if (profile) console.log(`   Author: ${profile}`);
	console.log(`   Found: ${lead.discovered_at} | id: ${lead.id}`);
}

async function main(): Promise<void> {
	loadEnv();
	const args = process.argv.slice(2);
	const command = args.find(a => !a.startsWith("--"));
	const store = new SqliteLeadStore({ path: process.env.LEADS_DB_PATH || undefined });

	try {
		switch (command) {
			case "dismiss": {
				const id = args[args.indexOf("dismiss") + 1];
				if (!id) {
					console.error("Usage: npm run leads -- dismiss <lead id>");
					process.exit(1);
				}
				const existing = store.get(id);
				if (!existing) {
					console.log(`No lead with id ${id}`);
				} else if (store.dismiss(id)) {
					console.log(`Dismissed ${id}`);
				} else {
					console.log(`${id} was already dismissed`);
				}
				return;
			}
			case "stats": {
				const stats = store.stats();
				console.log(`Total leads: ${stats.total}`);
				console.log(`Visible:     ${stats.visible}`);
				console.log(`Dismissed:   ${stats.dismissed}`);
				console.log(`Today:       ${stats.today}`);
				return;
			}
			case "export": {
				await runExport(store, parseFilters(args));
				return;
			}
			default: {
				const filters = parseFilters(args);
				const leads = store.list({ ...filters, limit: filters.limit ?? 20 });
				if (leads.length === 0) {
					console.log("No leads found.");
					return;
				}
				console.log(`Found ${leads.length} leads:`);
				console.log("─".repeat(60));
				leads.forEach((lead, i) => printLead(lead, i + 1));
				console.log("\n" + "─".repeat(60));
			}
		}
	} finally {
		store.close();
	}
}

if (import.meta.url === `file://${process.argv[1]}`) {
	main().catch((err) => {
		console.error("Leads command failed:", errorMessage(err));
		process.exit(1);
	});
}
