/**
 * Step 1: Search
 * Asks the configured provider for candidate posts matching one keyword phrase.
 */

import { phraseOf } from "../config";
import type { SearchProvider, SearchRequest } from "../fetchers/types";
import type { CandidatePost, Config } from "../types";
import { callAdapter, type AdapterResult } from "../utils";

export function buildSearchRequest(keyword: string, config: Config): SearchRequest {
	const { search, job_titles } = config;
	return {
		keyword: phraseOf(keyword),
		maxResults: search.results_per_keyword,
		dateFilter: search.date_filter,
		sortOrder: search.sort_type,
		authorJobTitles: search.use_job_title_filter && job_titles.length > 0 ? job_titles : undefined,
	};
}

export function searchKeyword(
	keyword: string,
	config: Config,
	provider: SearchProvider
): Promise<AdapterResult<CandidatePost[]>> {
	const request = buildSearchRequest(keyword, config);
	return callAdapter(provider.name, config.search.timeout_seconds * 1000, signal => provider.search(request, signal));
}
