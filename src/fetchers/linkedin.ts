/**
 * LinkedIn fetcher: runs an Apify posts-search actor synchronously and maps
 * its dataset items to candidate posts.
 */

import { z } from "zod";
import { AdapterUnavailableError, errorMessage } from "../errors";
import { extractCompanyFromTitle } from "../filters";
import type { CandidatePost } from "../types";
import type { SearchProvider, SearchRequest } from "./types";

const APIFY_API = "https://api.apify.com/v2";
const ACTOR_ID = "apimaestro~linkedin-posts-search-scraper-no-cookies";

const authorSchema = z.object({
	name: z.string().optional(),
	first_name: z.string().optional(),
	last_name: z.string().optional(),
	headline: z.string().nullish(),
	username: z.string().nullish(),
	profile_url: z.string().nullish(),
}).passthrough();

const postedAtSchema = z.union([
	z.string(),
	z.object({ date: z.string().optional(), timestamp: z.number().optional() }).passthrough(),
]);

const itemSchema = z.object({
	activity_id: z.union([z.string(), z.number()]).nullish(),
	post_url: z.string().nullish(),
	url: z.string().nullish(),
	postUrl: z.string().nullish(),
	text: z.string().nullish(),
	author: z.union([authorSchema, z.string()]).nullish(),
	posted_at: postedAtSchema.nullish(),
}).passthrough();

type ApifyItem = z.infer<typeof itemSchema>;

function postedAtOf(value: ApifyItem["posted_at"]): string | null {
	if (!value) return null;
	if (typeof value === "string") return value;
	if (value.timestamp !== undefined) return new Date(value.timestamp).toISOString();
	return value.date ?? null;
}

/** Maps one dataset item; items without a LinkedIn post URL are dropped. */
export function toCandidate(item: ApifyItem): CandidatePost | null {
	const url = item.post_url || item.url || item.postUrl;
	if (!url || !url.includes("linkedin.com/posts/")) return null;

	let authorName = "Unknown";
	let authorTitle = "";
	let authorHandle = "";
	let authorProfileUrl: string | undefined;

	if (typeof item.author === "string") {
		authorName = item.author;
	} else if (item.author) {
		const { name, first_name, last_name, headline, username, profile_url } = item.author;
		authorName = name || [first_name, last_name].filter(Boolean).join(" ") || "Unknown";
		authorTitle = headline ?? "";
		authorHandle = username ?? "";
		authorProfileUrl = profile_url ?? undefined;
	}

	return {
		platform: "linkedin",
		postId: item.activity_id != null ? String(item.activity_id) : "",
		url,
		content: item.text ?? "",
		authorName,
		authorHandle,
		authorProfileUrl,
		authorTitle,
		authorCompany: extractCompanyFromTitle(authorTitle),
		postedAt: postedAtOf(item.posted_at),
	};
}

export class LinkedInSearch implements SearchProvider {
	readonly name = "linkedin";

	constructor(private readonly token: string = process.env.APIFY_API_TOKEN || "") {}

	async search(request: SearchRequest, signal: AbortSignal): Promise<CandidatePost[]> {
		if (!this.token) {
			throw new AdapterUnavailableError("linkedin", "APIFY_API_TOKEN environment variable is required");
		}

		const runInput: Record<string, string | number> = {
			keyword: `"${request.keyword}"`,
			sort_type: request.sortOrder,
			date_filter: request.dateFilter,
			limit: Math.max(1, Math.min(50, request.maxResults)),
			page_number: 1,
		};
		if (request.authorJobTitles && request.authorJobTitles.length > 0) {
			runInput.author_job_title = request.authorJobTitles.join(", ");
		}

		const url = `${APIFY_API}/acts/${ACTOR_ID}/run-sync-get-dataset-items?token=${encodeURIComponent(this.token)}`;
		let resp: Response;
		try {
			resp = await fetch(url, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify(runInput),
				signal,
			});
		} catch (err) {
			throw new AdapterUnavailableError("linkedin", `request failed: ${errorMessage(err)}`, { cause: err });
		}

		if (!resp.ok) {
			const detail = (await resp.text()).slice(0, 200);
			throw new AdapterUnavailableError("linkedin", `Apify error: ${resp.status} ${resp.statusText} ${detail}`.trim(), {
				status: resp.status,
			});
		}

		const items = z.array(z.unknown()).safeParse(await resp.json());
		if (!items.success) {
			throw new AdapterUnavailableError("linkedin", "Apify returned a non-array dataset", { status: resp.status });
		}

		const posts: CandidatePost[] = [];
		for (const raw of items.data) {
			const item = itemSchema.safeParse(raw);
			if (!item.success) continue;
			const post = toCandidate(item.data);
			if (post) posts.push(post);
		}
		return posts;
	}
}
