/**
 * Twitter/X fetcher via twitterapi.io advanced search.
 * Pages through results 20 at a time until maxResults is reached.
 */

import { z } from "zod";
import { AdapterUnavailableError, errorMessage } from "../errors";
import { extractCompanyFromTitle } from "../filters";
import { sleep } from "../utils";
import type { CandidatePost, DateFilter } from "../types";
import type { SearchProvider, SearchRequest } from "./types";

const BASE_URL = "https://api.twitterapi.io";
const PAGE_DELAY_MS = 5000;

const LOOKBACK_HOURS: Record<DateFilter, number> = {
	"past-24h": 24,
	"past-week": 24 * 7,
	"past-month": 24 * 30,
};

const tweetSchema = z.object({
	id: z.union([z.string(), z.number()]),
	text: z.string().default(""),
	url: z.string().optional(),
	createdAt: z.string().optional(),
	author: z.object({
		name: z.string().default(""),
		userName: z.string().default(""),
		description: z.string().nullish(),
		url: z.string().nullish(),
	}).passthrough().default({}),
}).passthrough();

const pageSchema = z.object({
	tweets: z.array(z.unknown()).default([]),
	has_next_page: z.boolean().default(false),
	next_cursor: z.string().nullish(),
}).passthrough();

type Tweet = z.infer<typeof tweetSchema>;

export function buildQuery(keyword: string, dateFilter: DateFilter, now: Date = new Date()): string {
	const since = new Date(now.getTime() - LOOKBACK_HOURS[dateFilter] * 60 * 60 * 1000);
	return `"${keyword}" since:${since.toISOString().slice(0, 10)} -is:retweet`;
}

export function toCandidate(tweet: Tweet): CandidatePost {
	const id = String(tweet.id);
	const handle = tweet.author.userName;
	const bio = tweet.author.description ?? "";
	const created = tweet.createdAt ? new Date(tweet.createdAt) : null;

	return {
		platform: "twitter",
		postId: id,
		url: tweet.url || (handle ? `https://x.com/${handle}/status/${id}` : `https://x.com/i/status/${id}`),
		content: tweet.text,
		authorName: tweet.author.name,
		authorHandle: handle,
		authorProfileUrl: handle ? `https://x.com/${handle}` : undefined,
		authorTitle: bio,
		authorCompany: extractCompanyFromTitle(bio),
		postedAt: created && !Number.isNaN(created.getTime()) ? created.toISOString() : null,
	};
}

export class TwitterSearch implements SearchProvider {
	readonly name = "twitter";

	constructor(
		private readonly apiKey: string = process.env.TWITTER_API_KEY || "",
		private readonly pageDelayMs: number = PAGE_DELAY_MS
	) {}

	async search(request: SearchRequest, signal: AbortSignal): Promise<CandidatePost[]> {
		if (!this.apiKey) {
			throw new AdapterUnavailableError("twitter", "TWITTER_API_KEY environment variable is required");
		}

		const query = buildQuery(request.keyword, request.dateFilter);
		const queryType = request.sortOrder === "relevance" ? "Top" : "Latest";
		const posts: CandidatePost[] = [];
		let cursor = "";

		while (posts.length < request.maxResults) {
			const params = new URLSearchParams({ query, queryType, cursor });
			let resp: Response;
			try {
				resp = await fetch(`${BASE_URL}/twitter/tweet/advanced_search?${params}`, {
					headers: { "x-api-key": this.apiKey },
					signal,
				});
			} catch (err) {
				throw new AdapterUnavailableError("twitter", `request failed: ${errorMessage(err)}`, { cause: err });
			}

			if (!resp.ok) {
				const detail = (await resp.text()).slice(0, 200);
				throw new AdapterUnavailableError("twitter", `API error: ${resp.status} ${resp.statusText} ${detail}`.trim(), {
					status: resp.status,
				});
			}

			const page = pageSchema.safeParse(await resp.json());
			if (!page.success) {
				throw new AdapterUnavailableError("twitter", "unexpected search response shape", { status: resp.status });
			}

			for (const raw of page.data.tweets) {
				if (posts.length >= request.maxResults) break;
				const tweet = tweetSchema.safeParse(raw);
				if (tweet.success) posts.push(toCandidate(tweet.data));
			}

			if (page.data.tweets.length === 0 || !page.data.has_next_page || !page.data.next_cursor) break;
			cursor = page.data.next_cursor;

			if (posts.length < request.maxResults) {
				await sleep(this.pageDelayMs, signal);
			}
		}

		return posts;
	}
}
