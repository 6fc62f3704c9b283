export type Platform = "linkedin" | "twitter";

export type DateFilter = "past-24h" | "past-week" | "past-month";

export type SortOrder = "date_posted" | "relevance";

/** Raw post returned by a search provider, before filtering or classification. */
export interface CandidatePost {
	platform: Platform;
	postId: string;
	url: string;
	content: string;
	authorName: string;
	authorHandle: string;
	authorProfileUrl?: string;
	authorTitle: string;
	authorCompany: string;
	postedAt: string | null;
}

export interface Lead {
	id: string;
	platform: Platform;
	post_id: string;
	post_url: string;
	content: string;
	author_name: string;
	author_handle: string;
	author_profile_url: string | null;
	author_title: string;
	author_company: string;
	posted_at: string | null;

	matched_keywords: string[];
	matched_job_titles: string[];
	matched_industries: string[];
	budget_mention: string | null;

	// Classifier verdict
	relevance_rationale: string;
	confidence: number | null;
	lead_quality: LeadQuality | null;
	hiring_type: HiringType | null;

	discovered_at: string;
	dismissed: boolean;
}

/** Lead as handed to the store; the store stamps discovery time and visibility. */
export type NewLead = Omit<Lead, "discovered_at" | "dismissed">;

export interface LeadFilters {
	keyword?: string;
	jobTitle?: string;
	industry?: string;
	text?: string;
	platform?: Platform;
	includeDismissed?: boolean;
	limit?: number;
}

export interface LeadStats {
	total: number;
	visible: number;
	dismissed: number;
	today: number;
}

export type LeadQuality = "hot" | "warm" | "cold";

export type HiringType = "agency" | "in-house" | "unclear";

export interface RelevanceDecision {
	relevant: boolean;
	rationale: string;
	confidence?: number;
	quality?: LeadQuality;
	hiringType?: HiringType;
}

export interface RunError {
	keyword: string;
	reason: string;
	postId?: string;
}

export interface RunSummary {
	keywordsProcessed: number;
	candidatesFetched: number;
	candidatesFilteredOut: number;
	candidatesClassified: number;
	candidatesRejected: number;
	leadsCreated: number;
	duplicates: number;
	errors: RunError[];
	aborted: boolean;
	startedAt: string;
	finishedAt: string;
}

export interface SearchSettings {
	provider: Platform;
	results_per_keyword: number;
	date_filter: DateFilter;
	sort_type: SortOrder;
	use_job_title_filter: boolean;
	timeout_seconds: number;
}

export interface ClassifierSettings {
	timeout_seconds: number;
	/** Consecutive failures that open the circuit breaker for the rest of a run. */
	max_consecutive_failures: number;
	daily_limit: number;
}

export interface MonitoringSettings {
	active: boolean;
	interval_hours: number;
}

export interface Config {
	profile: string;
	keywords: string[];
	job_titles: string[];
	industries: string[];
	search: SearchSettings;
	classifier: ClassifierSettings;
	monitoring: MonitoringSettings;
}
