import { phraseOf } from "./config";
import type { CandidatePost, Config } from "./types";

export interface MatchedFilters {
	keywords: string[];
	jobTitles: string[];
	industries: string[];
}

function containsTerm(haystack: string, term: string): boolean {
	const needle = term.trim().toLowerCase();
	return needle.length > 0 && haystack.toLowerCase().includes(needle);
}

/** Job titles (case-insensitive substring) contained in the author's title. */
export function matchJobTitles(authorTitle: string, jobTitles: string[]): string[] {
	return jobTitles.filter(title => containsTerm(authorTitle, title));
}

/**
 * Gate applied before classification. With the filter off, or no titles
 * configured, every candidate passes.
 */
export function passesJobTitleFilter(post: CandidatePost, config: Config): boolean {
	if (!config.search.use_job_title_filter || config.job_titles.length === 0) return true;
	return matchJobTitles(post.authorTitle, config.job_titles).length > 0;
}

/**
 * Records which configured terms a post matched. The keyword that found the
 * post is always included; industries are informational only.
 */
export function detectMatchedFilters(post: CandidatePost, searchKeyword: string, config: Config): MatchedFilters {
	const searched = phraseOf(searchKeyword);
	const keywords = [searched];
	for (const keyword of config.keywords) {
		const phrase = phraseOf(keyword);
		if (!keywords.includes(phrase) && containsTerm(post.content, phrase)) {
			keywords.push(phrase);
		}
	}

	const industryText = [post.content, post.authorCompany, post.authorTitle].join("\n");

	return {
		keywords,
		jobTitles: matchJobTitles(post.authorTitle, config.job_titles),
		industries: config.industries.filter(industry => containsTerm(industryText, industry)),
	};
}

/**
 * Company from a headline such as "CMO at Acme Corp", "Marketing Director @ Beauty Co"
 * or "VP Marketing | Food Inc".
 */
export function extractCompanyFromTitle(title: string | null | undefined): string {
	const trimmed = title?.trim();
	if (!trimmed) return "";

	const at = trimmed.match(/\bat\b(.+)/i);
	if (at) return at[1].trim();

	for (const separator of ["@", "|"]) {
		const index = trimmed.indexOf(separator);
		if (index !== -1) return trimmed.slice(index + 1).trim();
	}
	return "";
}

const BUDGET_PATTERNS = [
	/\$[\d,]+k?(?:\s*(?:-|to)\s*\$[\d,]+k?)?/i,
	/budget.*?\$[\d,]+/i,
	/retainer.*?\$[\d,]+/i,
	/[\d,]+k?\s*(?:per|\/)\s*month/i,
];

/** First budget or retainer mention in a post, if any. */
export function extractBudgetMention(text: string): string | null {
	for (const pattern of BUDGET_PATTERNS) {
		const match = text.match(pattern);
		if (match) return match[0];
	}
	return null;
}
