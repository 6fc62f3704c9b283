import type { ClassifyRequest, RelevanceClassifier } from "./llm/classifier";
import type { SearchProvider, SearchRequest } from "./fetchers/types";
import type { Log } from "./log";
import type { CandidatePost, Config, Platform, RelevanceDecision } from "./types";

export const silentLog: Log = {
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

export function testConfig(overrides: Partial<Config> = {}): Config {
	return {
		profile: "a PR agency for consumer brands",
		keywords: ['"looking for a PR agency"'],
		job_titles: ["Marketing", "CMO"],
		industries: ["Beauty", "CPG"],
		search: {
			provider: "linkedin",
			results_per_keyword: 5,
			date_filter: "past-24h",
			sort_type: "date_posted",
			use_job_title_filter: true,
			timeout_seconds: 5,
		},
		classifier: { timeout_seconds: 5, max_consecutive_failures: 5, daily_limit: 1000 },
		monitoring: { active: false, interval_hours: 1 },
		...overrides,
	};
}

/** LinkedIn post with a 19-digit activity id built from `n`. */
export function testPost(n: number, overrides: Partial<CandidatePost> = {}): CandidatePost {
	const activity = `738030129135426${String(n).padStart(4, "0")}`;
	return {
		platform: "linkedin",
		postId: activity,
		url: `https://www.linkedin.com/posts/author-${n}_pr-activity-${activity}-abcd`,
		content: `Post ${n}: we are looking for a PR agency for our Beauty launch`,
		authorName: `Author ${n}`,
		authorHandle: `author-${n}`,
		authorTitle: "Senior Marketing Manager at Glow Co",
		authorCompany: "Glow Co",
		postedAt: "2026-10-17T09:00:00.000Z",
		...overrides,
	};
}

type SearchBehaviour = CandidatePost[] | Error | "hang";

/** Search provider answering from a table keyed by keyword phrase. */
export class FakeSearch implements SearchProvider {
	readonly calls: SearchRequest[] = [];

	constructor(
		private readonly results: Record<string, SearchBehaviour>,
		readonly name: Platform = "linkedin"
	) {}

	async search(request: SearchRequest, signal: AbortSignal): Promise<CandidatePost[]> {
		this.calls.push(request);
		const result = this.results[request.keyword] ?? [];
		if (result === "hang") return hang<CandidatePost[]>(signal);
		if (result instanceof Error) throw result;
		return result;
	}
}

type Decide = (request: ClassifyRequest) => RelevanceDecision | Error | "hang";

export class FakeClassifier implements RelevanceClassifier {
	readonly calls: ClassifyRequest[] = [];

	constructor(private readonly decide: Decide) {}

	async classify(request: ClassifyRequest, signal: AbortSignal): Promise<RelevanceDecision> {
		this.calls.push(request);
		const result = this.decide(request);
		if (result === "hang") return hang<RelevanceDecision>(signal);
		if (result instanceof Error) throw result;
		return result;
	}
}

/** Never resolves on its own; rejects when the caller gives up. */
function hang<T>(signal: AbortSignal): Promise<T> {
	return new Promise((_, reject) => {
		signal.addEventListener("abort", () => reject(signal.reason), { once: true });
	});
}
