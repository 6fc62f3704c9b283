import type { CandidatePost } from "./types";

const LINKEDIN_ACTIVITY = /\/posts\/[^/]*?-(\d{19})(?:-|\/|$)/;
const ANY_ACTIVITY = /(?:activity[:-]|^|\D)(\d{19})(?:\D|$)/;
const TWEET_STATUS = /\/status(?:es)?\/(\d+)/;
const TWITTER_HOSTS = new Set(["twitter.com", "x.com", "mobile.twitter.com", "mobile.x.com"]);

function parseHttpUrl(url: string): URL | null {
	try {
		const parsed = new URL(url.trim());
		return parsed.protocol === "http:" || parsed.protocol === "https:" ? parsed : null;
	} catch {
		return null;
	}
}

function hostOf(url: URL): string {
	return url.hostname.toLowerCase().replace(/^www\./, "");
}

/** Lower-cased host without www, path without trailing slash, query and fragment dropped. */
export function canonicalizeUrl(url: string): string | null {
	const parsed = parseHttpUrl(url);
	if (!parsed) return null;
	const pathname = parsed.pathname.replace(/\/+$/, "");
	return `${hostOf(parsed)}${pathname}`;
}

/**
 * Stable deduplication key for a post. The same LinkedIn activity or tweet
 * reached through different URL shapes maps to the same key.
 */
export function identityKey(post: Pick<CandidatePost, "platform" | "postId" | "url">): string | null {
	const parsed = parseHttpUrl(post.url);

	if (parsed) {
		const host = hostOf(parsed);
		if (host.endsWith("linkedin.com")) {
			const activity = parsed.pathname.match(LINKEDIN_ACTIVITY) ?? parsed.pathname.match(ANY_ACTIVITY);
			if (activity) return `linkedin:${activity[1]}`;
		}
		if (TWITTER_HOSTS.has(host)) {
			const status = parsed.pathname.match(TWEET_STATUS);
			if (status) return `twitter:${status[1]}`;
		}
	}

	const postId = post.postId.trim();
	if (post.platform === "linkedin" && /^\d{19}$/.test(postId)) {
		return `linkedin:${postId}`;
	}

	const canonical = parsed ? canonicalizeUrl(post.url) : null;
	if (canonical) return `url:${canonical}`;

	if (postId) return `${post.platform}:${postId}`;
	return null;
}
