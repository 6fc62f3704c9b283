/**
 * Step 3: Classify
 * One language-model verdict per surviving candidate, under the classifier deadline.
 * With a guard, calls past the daily limit or an open circuit breaker fail without reaching the model.
 */

import { phraseOf } from "../config";
import type { RelevanceClassifier } from "../llm/classifier";
import type { ClassifierGuard } from "../llm/guard";
import type { Config, RelevanceDecision } from "../types";
import { callAdapter, type AdapterResult } from "../utils";
import type { FilteredCandidate } from "./2-filter";

export async function classifyCandidate(
	candidate: FilteredCandidate,
	config: Config,
	classifier: RelevanceClassifier,
	guard?: ClassifierGuard
): Promise<AdapterResult<RelevanceDecision>> {
	const blocked = guard?.check();
	if (blocked) return { ok: false, error: blocked };

	const { post } = candidate;
	const request = {
		content: post.content,
		platform: post.platform,
		author: { name: post.authorName, title: post.authorTitle, company: post.authorCompany },
		keywords: config.keywords.map(phraseOf),
	};
	const result = await callAdapter("classifier", config.classifier.timeout_seconds * 1000, signal => classifier.classify(request, signal));
	guard?.record(result.ok);
	return result;
}
