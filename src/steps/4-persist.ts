/**
 * Step 4: Persist
 * Turns a relevant candidate into a lead and inserts it if its identity is new.
 */

import type { LeadStore, UpsertResult } from "../db";
import { extractBudgetMention } from "../filters";
import type { NewLead, RelevanceDecision } from "../types";
import type { FilteredCandidate } from "./2-filter";

export function buildLead({ leadId, post, matched }: FilteredCandidate, decision: RelevanceDecision): NewLead {
	return {
		id: leadId,
		platform: post.platform,
		post_id: post.postId,
		post_url: post.url,
		content: post.content,
		author_name: post.authorName,
		author_handle: post.authorHandle,
		author_profile_url: post.authorProfileUrl ?? null,
		author_title: post.authorTitle,
		author_company: post.authorCompany,
		posted_at: post.postedAt,
		matched_keywords: matched.keywords,
		matched_job_titles: matched.jobTitles,
		matched_industries: matched.industries,
		budget_mention: extractBudgetMention(post.content),
		relevance_rationale: decision.rationale,
		confidence: decision.confidence ?? null,
		lead_quality: decision.quality ?? null,
		hiring_type: decision.hiringType ?? null,
	};
}

/** Throws StorageUnavailableError when the store cannot be reached. */
export function persistLead(store: LeadStore, candidate: FilteredCandidate, decision: RelevanceDecision): UpsertResult {
	return store.upsertIfNew(buildLead(candidate, decision));
}
