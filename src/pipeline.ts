/**
 * Lead monitor pipeline
 * Per keyword: Search → Filter → Classify → Persist
 *
 * Usage:
 *   npm run pipeline                 # One run with config/config.yaml
 *   npm run pipeline -- --dry-run    # Validate config and print the plan
 */

import { loadConfig, parseConfig, phraseOf } from "./config";
import { SqliteLeadStore, type LeadStore } from "./db";
import { loadEnv } from "./env";
import { errorMessage, StorageUnavailableError } from "./errors";
import { createSearchProvider, type SearchProvider } from "./fetchers/index";
import { LlmClassifier, type RelevanceClassifier } from "./llm/classifier";
import { ClassifierGuard } from "./llm/guard";
import { createLog, type Log } from "./log";
import type { Config, RunSummary } from "./types";
import { truncate } from "./utils";
import { searchKeyword } from "./steps/1-search";
import { filterCandidates } from "./steps/2-filter";
import { classifyCandidate } from "./steps/3-classify";
import { persistLead } from "./steps/4-persist";

export interface PipelineDeps {
	search: SearchProvider;
	classifier: RelevanceClassifier;
	store: LeadStore;
	guard?: ClassifierGuard;
	log?: Log;
}

const pipelineLog = createLog("pipeline.log");

function emptySummary(): RunSummary {
	return {
		keywordsProcessed: 0,
		candidatesFetched: 0,
		candidatesFilteredOut: 0,
		candidatesClassified: 0,
		candidatesRejected: 0,
		leadsCreated: 0,
		duplicates: 0,
		errors: [],
		aborted: false,
		startedAt: new Date().toISOString(),
		finishedAt: "",
	};
}

async function processKeyword(keyword: string, config: Config, deps: PipelineDeps, summary: RunSummary, seen: Set<string>): Promise<void> {
	const log = deps.log ?? pipelineLog;

	const searched = await searchKeyword(keyword, config, deps.search);
	if (!searched.ok) {
		log.error(`    ERROR: ${searched.error.message}`);
		summary.errors.push({ keyword, reason: searched.error.message });
		return;
	}

	const posts = searched.value;
	summary.candidatesFetched += posts.length;
	log.info(`    Found ${posts.length} posts`);

	const filtered = filterCandidates(keyword, posts, config, deps.store, seen);
	summary.candidatesFilteredOut += filtered.filteredOut;
	summary.duplicates += filtered.duplicates;
	summary.errors.push(...filtered.errors);
	if (filtered.filteredOut > 0 || filtered.duplicates > 0) {
		log.info(`    Filtered out ${filtered.filteredOut} by job title, ${filtered.duplicates} already known`);
	}

	for (const candidate of filtered.survivors) {
		const { post } = candidate;
		const classified = await classifyCandidate(candidate, config, deps.classifier, deps.guard);
		if (!classified.ok) {
			log.error(`    ERROR classifying ${candidate.leadId}: ${classified.error.message}`);
			summary.errors.push({ keyword, reason: classified.error.message, postId: post.postId || candidate.leadId });
			// Unclassified: a later keyword that finds the same post gets another try
			seen.delete(candidate.leadId);
			continue;
		}

		summary.candidatesClassified++;
		const decision = classified.value;
		if (!decision.relevant) {
			summary.candidatesRejected++;
			log.info(`    Rejected: ${post.authorName} (${truncate(decision.rationale, 100)})`);
			continue;
		}

		const { stored } = persistLead(deps.store, candidate, decision);
		if (stored) {
			summary.leadsCreated++;
			log.info(`    Saved lead: ${post.authorName} at ${post.authorCompany || "Unknown Company"}`);
		} else {
			summary.duplicates++;
		}
	}
}

/**
 * One pass over every configured keyword, in order. Search and classifier
 * failures are recorded and skipped; a storage failure ends the run early.
 * Throws ConfigInvalidError before doing anything if the config is invalid.
 */
export async function runPipeline(config: unknown, deps: PipelineDeps): Promise<RunSummary> {
	const validConfig = parseConfig(config);
	const log = deps.log ?? pipelineLog;
	const summary = emptySummary();
	const seen = new Set<string>();
	const { keywords } = validConfig;
	deps.guard?.resetBreaker();

	log.info("=".repeat(50));
	log.info(`Lead monitor run (${deps.search.name})`);
	log.info("=".repeat(50));
	log.info(`  Keywords: ${keywords.length}`);
	log.info(`  Results per keyword: ${validConfig.search.results_per_keyword}`);
	log.info(`  Date filter: ${validConfig.search.date_filter}`);

	for (let i = 0; i < keywords.length; i++) {
		const keyword = phraseOf(keywords[i]);
		log.info(`\n  [${i + 1}/${keywords.length}] Searching: '${keyword}'`);
		summary.keywordsProcessed++;

		try {
			await processKeyword(keyword, validConfig, deps, summary, seen);
		} catch (err) {
			if (!(err instanceof StorageUnavailableError)) throw err;
			log.error(`    FATAL: ${err.message}`);
			summary.errors.push({ keyword, reason: err.message });
			summary.aborted = true;
			break;
		}
	}

	summary.finishedAt = new Date().toISOString();
	const seconds = ((Date.parse(summary.finishedAt) - Date.parse(summary.startedAt)) / 1000).toFixed(1);
	log.info(`\nRun ${summary.aborted ? "ABORTED" : "complete"} in ${seconds}s`);
	log.info(`  Fetched: ${summary.candidatesFetched} | Filtered out: ${summary.candidatesFilteredOut} | Classified: ${summary.candidatesClassified} | New leads: ${summary.leadsCreated} | Errors: ${summary.errors.length}`);
	if (deps.guard) {
		const usage = deps.guard.usage();
		log.info(`  Classifier calls today: ${usage.dailyCalls}/${usage.dailyLimit}${usage.breakerOpen ? " (circuit breaker open)" : ""}`);
	}

	return summary;
}

export function classifierGuard(config: Config): ClassifierGuard {
	return new ClassifierGuard({
		maxConsecutiveFailures: config.classifier.max_consecutive_failures,
		dailyLimit: config.classifier.daily_limit,
	});
}

/** Pass a long-lived guard to share the daily budget across runs. */
export function createDeps(config: Config, store: LeadStore, guard = classifierGuard(config)): PipelineDeps {
	return {
		search: createSearchProvider(config.search.provider),
		classifier: new LlmClassifier({
			profile: config.profile,
			jobTitles: config.job_titles,
			industries: config.industries,
		}),
		store,
		guard,
	};
}

async function main(): Promise<void> {
	loadEnv();
	const config = loadConfig();

	if (process.argv.includes("--dry-run")) {
		console.log(`Config OK: ${config.keywords.length} keywords via ${config.search.provider}`);
		config.keywords.forEach((k, i) => console.log(`  ${i + 1}. ${phraseOf(k)}`));
		return;
	}

	const store = new SqliteLeadStore({ path: process.env.LEADS_DB_PATH || undefined });
	try {
		const summary = await runPipeline(config, createDeps(config, store));
		console.log("\nSummary:");
		console.log(JSON.stringify(summary, null, 2));

		const stats = store.stats();
		console.log("\nDatabase stats:");
		console.log(`  Total leads: ${stats.total}`);
		console.log(`  Visible: ${stats.visible}`);
		console.log(`  Dismissed: ${stats.dismissed}`);
		console.log(`  Today: ${stats.today}`);
	} finally {
		store.close();
	}
}

// Run when called directly (not when imported by daemon or tests)
if (import.meta.url === `file://${process.argv[1]}`) {
	main().catch((err) => {
		console.error("\nPipeline failed:", errorMessage(err));
		process.exit(1);
	});
}
