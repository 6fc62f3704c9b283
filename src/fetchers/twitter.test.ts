import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildQuery, TwitterSearch } from "./twitter";
import type { SearchRequest } from "./types";

const request: SearchRequest = {
	keyword: "need a PR firm",
	maxResults: 3,
	dateFilter: "past-week",
	sortOrder: "relevance",
};

function page(tweets: unknown[], nextCursor: string | null): Response {
	return new Response(
		JSON.stringify({ tweets, has_next_page: nextCursor !== null, next_cursor: nextCursor }),
		{ status: 200 }
	);
}

function tweet(id: string, userName = "samlee"): Record<string, unknown> {
	return {
		id,
		text: `Need a PR firm asap (${id})`,
		createdAt: "2026-10-17T10:00:00.000Z",
		author: { name: "Sam Lee", userName, description: "Founder @ Crunch Foods" },
	};
}

describe("buildQuery", () => {
	it("quotes the phrase, bounds the date and excludes retweets", () => {
		const now = new Date("2026-10-18T12:00:00.000Z");
		expect(buildQuery("need a PR firm", "past-week", now)).toBe('"need a PR firm" since:2026-10-11 -is:retweet');
		expect(buildQuery("need a PR firm", "past-24h", now)).toBe('"need a PR firm" since:2026-10-17 -is:retweet');
	});
});

describe("TwitterSearch", () => {
	const fetchMock = vi.fn<typeof fetch>();

	beforeEach(() => {
		fetchMock.mockReset();
		vi.stubGlobal("fetch", fetchMock);
	});

	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it("pages with the cursor until enough tweets are collected", async () => {
		fetchMock
			.mockResolvedValueOnce(page([tweet("101"), tweet("102")], "c1"))
			.mockResolvedValueOnce(page([tweet("103"), tweet("104")], "c2"));

		const posts = await new TwitterSearch("test-secret", 0).search(request, new AbortController().signal);

		expect(posts.map(p => p.postId)).toEqual(["101", "102", "103"]);
		expect(fetchMock).toHaveBeenCalledTimes(2);

		const first = new URL(String(fetchMock.mock.calls[0][0]));
		expect(first.pathname).toBe("/twitter/tweet/advanced_search");
		expect(first.searchParams.get("queryType")).toBe("Top");
		expect(first.searchParams.get("query")).toMatch(/^"need a PR firm" since:\d{4}-\d{2}-\d{2} -is:retweet$/);
		expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ "x-api-key": "test-secret" });

		const second = new URL(String(fetchMock.mock.calls[1][0]));
		expect(second.searchParams.get("cursor")).toBe("c1");
	});

	it("maps tweet fields to a candidate post", async () => {
		fetchMock.mockResolvedValueOnce(page([tweet("101"), tweet("102", "")], null));

		const [withHandle, withoutHandle] = await new TwitterSearch("test-secret", 0).search(
			request,
			new AbortController().signal
		);

		expect(withHandle).toEqual({
			platform: "twitter",
			postId: "101",
			url: "https://x.com/samlee/status/101",
			content: "Need a PR firm asap (101)",
			authorName: "Sam Lee",
			authorHandle: "samlee",
			authorProfileUrl: "https://x.com/samlee",
			authorTitle: "Founder @ Crunch Foods",
			authorCompany: "Crunch Foods",
			postedAt: "2026-10-17T10:00:00.000Z",
		});
		expect(withoutHandle.url).toBe("https://x.com/i/status/102");
		expect(withoutHandle.authorProfileUrl).toBeUndefined();
	});

	it("stops when the API reports no further pages", async () => {
		fetchMock.mockResolvedValueOnce(page([tweet("101")], null));

		const posts = await new TwitterSearch("test-secret", 0).search(request, new AbortController().signal);

		expect(posts).toHaveLength(1);
		expect(fetchMock).toHaveBeenCalledTimes(1);
	});

	it("raises AdapterUnavailableError with the HTTP status", async () => {
		fetchMock.mockResolvedValueOnce(new Response("Unauthorized", { status: 401, statusText: "Unauthorized" }));

		await expect(
			new TwitterSearch("test-secret", 0).search(request, new AbortController().signal)
		).rejects.toMatchObject({ name: "AdapterUnavailableError", adapter: "twitter", status: 401 });
	});
});
