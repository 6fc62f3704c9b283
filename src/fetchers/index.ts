import { LinkedInSearch } from "./linkedin";
import { TwitterSearch } from "./twitter";
import type { Platform } from "../types";
import type { SearchProvider } from "./types";

export type { SearchProvider, SearchRequest } from "./types";

export function createSearchProvider(platform: Platform): SearchProvider {
	switch (platform) {
		case "linkedin":
			return new LinkedInSearch();
		case "twitter":
			return new TwitterSearch();
	}
}
