import type { CandidatePost, DateFilter, Platform, SortOrder } from "../types";

export interface SearchRequest {
	/** Exact phrase, without surrounding quotes. */
	keyword: string;
	maxResults: number;
	dateFilter: DateFilter;
	sortOrder: SortOrder;
	/** Provider-side author title narrowing, where the provider supports it. */
	authorJobTitles?: string[];
}

export interface SearchProvider {
	readonly name: Platform;
	search(request: SearchRequest, signal: AbortSignal): Promise<CandidatePost[]>;
}
