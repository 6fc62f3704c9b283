import { z } from "zod";
import { AdapterUnavailableError, errorMessage } from "../errors";
import type { RelevanceDecision } from "../types";
import { callFast, type Complete } from "./client";
import { loadPromptTemplate, renderPrompt } from "./prompts/index";

const SYSTEM_PROMPT =
	"You are an expert at analyzing social media posts to identify genuine business leads. Always respond with valid JSON only.";

export interface ClassifyRequest {
	content: string;
	platform?: string;
	author?: {
		name: string;
		title: string;
		company: string;
	};
	/** Configured search phrases, given to the model as intent context. */
	keywords?: string[];
}

export interface RelevanceClassifier {
	classify(request: ClassifyRequest, signal: AbortSignal): Promise<RelevanceDecision>;
}

export interface ClassifierContext {
	profile: string;
	jobTitles: string[];
	industries: string[];
}

const verdictSchema = z.object({
	is_genuine_lead: z.boolean(),
	confidence_score: z.number().min(0).max(100).optional(),
	lead_quality: z.enum(["hot", "warm", "cold"]).optional().catch(undefined),
	hiring_type: z.enum(["agency", "in-house", "unclear"]).optional().catch(undefined),
	reasoning: z.string().default(""),
});

/**
 * Reads the model's JSON verdict. Tolerates markdown code fences and prose
 * around the object; anything else is an adapter failure.
 */
export function parseVerdict(response: string): RelevanceDecision {
	const jsonMatch = response.match(/\{[\s\S]*\}/);
	if (!jsonMatch) {
		throw new AdapterUnavailableError("classifier", "no JSON object in model response");
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(jsonMatch[0]);
	} catch (err) {
		throw new AdapterUnavailableError("classifier", `invalid JSON in model response: ${errorMessage(err)}`);
	}

	const verdict = verdictSchema.safeParse(parsed);
	if (!verdict.success) {
		const issues = verdict.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
		throw new AdapterUnavailableError("classifier", `model response failed validation: ${issues}`);
	}

	const { is_genuine_lead, confidence_score, lead_quality, hiring_type, reasoning } = verdict.data;
	return {
		relevant: is_genuine_lead,
		rationale: reasoning,
		confidence: confidence_score,
		quality: lead_quality,
		hiringType: hiring_type,
	};
}

export function buildRelevancePrompt(request: ClassifyRequest, context: ClassifierContext): string {
	const list = (items: string[] | undefined): string => (items && items.length > 0 ? items.join(", ") : "(any)");

	return renderPrompt(loadPromptTemplate("relevance"), {
		platform: request.platform === "twitter" ? "Twitter/X" : "LinkedIn",
		profile: context.profile,
		"post.content": request.content,
		"post.author_name": request.author?.name || "Unknown",
		"post.author_title": request.author?.title || "(none)",
		"post.author_company": request.author?.company || "(unknown)",
		job_titles: list(context.jobTitles),
		industries: list(context.industries),
		keywords: list(request.keywords),
	});
}

export class LlmClassifier implements RelevanceClassifier {
	constructor(
		private readonly context: ClassifierContext,
		private readonly complete: Complete = callFast
	) {}

	async classify(request: ClassifyRequest, signal: AbortSignal): Promise<RelevanceDecision> {
		const prompt = buildRelevancePrompt(request, this.context);
		let response: string;
		try {
			response = await this.complete({ system: SYSTEM_PROMPT, prompt, maxTokens: 500, temperature: 0.1 }, signal);
		} catch (err) {
			throw new AdapterUnavailableError("classifier", errorMessage(err), { cause: err });
		}
		return parseVerdict(response);
	}
}
