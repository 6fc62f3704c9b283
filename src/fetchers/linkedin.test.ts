import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AdapterUnavailableError } from "../errors";
import { LinkedInSearch } from "./linkedin";
import type { SearchRequest } from "./types";

const request: SearchRequest = {
	keyword: "looking for a PR agency",
	maxResults: 5,
	dateFilter: "past-24h",
	sortOrder: "date_posted",
	authorJobTitles: ["CMO", "Marketing"],
};

const dataset = [
	{
		activity_id: "7380301291354263553",
		post_url: "https://www.linkedin.com/posts/dana-reyes_pr-activity-7380301291354263553-AbCd",
		text: "Looking for a PR agency for our spring launch.",
		author: {
			first_name: "Dana",
			last_name: "Reyes",
			headline: "CMO at Glow Co",
			username: "dana-reyes",
			profile_url: "https://www.linkedin.com/in/dana-reyes",
		},
		posted_at: { date: "2026-10-17 09:15:00" },
	},
	{
		url: "https://www.linkedin.com/posts/sam-lee_need-pr-activity-7380301291354263554-XyZw",
		text: "Need a PR firm, DMs open.",
		author: "Sam Lee",
		posted_at: "2026-10-16T08:00:00Z",
	},
	{
		post_url: "https://www.linkedin.com/feed/update/urn:li:activity:7380301291354263555",
		text: "Not a post URL",
	},
	42,
];

describe("LinkedInSearch", () => {
	const fetchMock = vi.fn<typeof fetch>();

	beforeEach(() => {
		fetchMock.mockReset();
		vi.stubGlobal("fetch", fetchMock);
	});

	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it("runs the actor with the quoted phrase and search options", async () => {
		fetchMock.mockResolvedValue(new Response("[]", { status: 200 }));

		await new LinkedInSearch("test-secret").search(request, new AbortController().signal);

		expect(fetchMock).toHaveBeenCalledTimes(1);
		const [url, init] = fetchMock.mock.calls[0];
		expect(String(url)).toBe(
			"https://api.apify.com/v2/acts/apimaestro~linkedin-posts-search-scraper-no-cookies/run-sync-get-dataset-items?token=test-secret"
		);
		expect(init?.method).toBe("POST");
		expect(JSON.parse(String(init?.body))).toEqual({
			keyword: '"looking for a PR agency"',
			sort_type: "date_posted",
			date_filter: "past-24h",
			limit: 5,
			page_number: 1,
			author_job_title: "CMO, Marketing",
		});
	});

	it("maps dataset items and drops those without a post URL", async () => {
		fetchMock.mockResolvedValue(new Response(JSON.stringify(dataset), { status: 200 }));

		const posts = await new LinkedInSearch("test-secret").search(request, new AbortController().signal);

		expect(posts).toEqual([
			{
				platform: "linkedin",
				postId: "7380301291354263553",
				url: "https://www.linkedin.com/posts/dana-reyes_pr-activity-7380301291354263553-AbCd",
				content: "Looking for a PR agency for our spring launch.",
				authorName: "Dana Reyes",
				authorHandle: "dana-reyes",
				authorProfileUrl: "https://www.linkedin.com/in/dana-reyes",
				authorTitle: "CMO at Glow Co",
				authorCompany: "Glow Co",
				postedAt: "2026-10-17 09:15:00",
			},
			{
				platform: "linkedin",
				postId: "",
				url: "https://www.linkedin.com/posts/sam-lee_need-pr-activity-7380301291354263554-XyZw",
				content: "Need a PR firm, DMs open.",
				authorName: "Sam Lee",
				authorHandle: "",
				authorProfileUrl: undefined,
				authorTitle: "",
				authorCompany: "",
				postedAt: "2026-10-16T08:00:00Z",
			},
		]);
	});

	it("raises AdapterUnavailableError with the HTTP status", async () => {
		fetchMock.mockResolvedValue(new Response("Forbidden", { status: 403, statusText: "Forbidden" }));

		const search = new LinkedInSearch("test-secret").search(request, new AbortController().signal);

		await expect(search).rejects.toBeInstanceOf(AdapterUnavailableError);
		await expect(search).rejects.toMatchObject({ status: 403 });
	});

	it("refuses to run without a token", async () => {
		await expect(new LinkedInSearch("").search(request, new AbortController().signal)).rejects.toThrow(
			"linkedin: APIFY_API_TOKEN environment variable is required"
		);
		expect(fetchMock).not.toHaveBeenCalled();
	});
});
