/**
 * Step 2: Filter
 * Applies the job-title gate, drops posts already stored or already seen this
 * run, and records which keywords, job titles and industries matched.
 */

import type { LeadStore } from "../db";
import { detectMatchedFilters, passesJobTitleFilter, type MatchedFilters } from "../filters";
import { identityKey } from "../identity";
import type { CandidatePost, Config, RunError } from "../types";

export interface FilteredCandidate {
	leadId: string;
	post: CandidatePost;
	matched: MatchedFilters;
}

export interface FilterResult {
	survivors: FilteredCandidate[];
	filteredOut: number;
	duplicates: number;
	errors: RunError[];
}

export function filterCandidates(
	keyword: string,
	posts: CandidatePost[],
	config: Config,
	store: LeadStore,
	seen: Set<string>
): FilterResult {
	const result: FilterResult = { survivors: [], filteredOut: 0, duplicates: 0, errors: [] };

	for (const post of posts) {
		if (!passesJobTitleFilter(post, config)) {
			result.filteredOut++;
			continue;
		}

		const leadId = identityKey(post);
		if (!leadId) {
			result.errors.push({ keyword, reason: "post has neither a usable URL nor an ID", postId: post.postId || undefined });
			continue;
		}

		if (seen.has(leadId) || store.has(leadId)) {
			seen.add(leadId);
			result.duplicates++;
			continue;
		}
		seen.add(leadId);

		result.survivors.push({ leadId, post, matched: detectMatchedFilters(post, keyword, config) });
	}

	return result;
}
