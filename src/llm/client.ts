import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { errorMessage } from "../errors";
import { createLog } from "../log";
import { sleep } from "../utils";

const TIMEOUT_MS = 30000;
const MAX_RETRIES = 3;
const RETRY_DELAY_MS = 1000;
const RATE_LIMIT_DELAY_MS = 15000;

const log = createLog("llm-errors.log");

let anthropicClient: Anthropic | null = null;
let openaiClient: OpenAI | null = null;

export interface CompletionRequest {
	system: string;
	prompt: string;
	maxTokens?: number;
	temperature?: number;
}

/** Sends one prompt and returns the model's text answer. */
export type Complete = (request: CompletionRequest, signal?: AbortSignal) => Promise<string>;

function provider(): "openai" | "anthropic" {
	return process.env.LLM_PROVIDER === "anthropic" ? "anthropic" : "openai";
}

function getAnthropicClient(): Anthropic {
	if (!anthropicClient) {
		const apiKey = process.env.ANTHROPIC_API_KEY;
		if (!apiKey) {
			throw new Error("ANTHROPIC_API_KEY environment variable is required");
		}
		anthropicClient = new Anthropic({ apiKey, timeout: TIMEOUT_MS, maxRetries: 0 });
	}
	return anthropicClient;
}

function getOpenAIClient(): OpenAI {
	if (!openaiClient) {
		const apiKey = process.env.OPENAI_API_KEY;
		if (!apiKey) {
			throw new Error("OPENAI_API_KEY environment variable is required");
		}
		openaiClient = new OpenAI({ apiKey, timeout: TIMEOUT_MS, maxRetries: 0 });
	}
	return openaiClient;
}

interface ApiErrorDetail {
	status?: number;
	retryAfter?: string | null;
}

function apiErrorDetail(error: unknown): ApiErrorDetail {
	if (error instanceof OpenAI.APIError || error instanceof Anthropic.APIError) {
		return { status: error.status, retryAfter: error.headers?.["retry-after"] };
	}
	return {};
}

export function isRetryableError(error: unknown): boolean {
	const message = errorMessage(error);
	const { status } = apiErrorDetail(error);
	return (
		message.includes("timeout") ||
		message.includes("ECONNRESET") ||
		message.includes("ETIMEDOUT") ||
		message.includes("overloaded") ||
		status === 429 ||
		status === 529 ||
		(status !== undefined && status >= 500)
	);
}

async function handleRetry(error: unknown, model: string, attempt: number, signal?: AbortSignal): Promise<void> {
	const message = errorMessage(error);
	const { status, retryAfter } = apiErrorDetail(error);

	if (status === 429) {
		const waitMs = retryAfter ? parseInt(retryAfter, 10) * 1000 + 1000 : RATE_LIMIT_DELAY_MS;
		log.warn(`RATE_LIMIT ${attempt}/${MAX_RETRIES} [${model}]: waiting ${waitMs}ms`);
		await sleep(waitMs, signal);
		return;
	}

	if (isRetryableError(error)) {
		log.warn(`RETRY ${attempt}/${MAX_RETRIES} [${model}]: ${message}`);
		await sleep(RETRY_DELAY_MS * 2 ** (attempt - 1), signal);
		return;
	}

	log.error(`FAIL [${model}]: ${message} (not retryable)`);
	throw error;
}

async function withRetry(model: string, signal: AbortSignal | undefined, call: () => Promise<string>): Promise<string> {
	for (let attempt = 1; ; attempt++) {
		try {
			return await call();
		} catch (error) {
			if (signal?.aborted) throw error;
			if (attempt === MAX_RETRIES) {
				log.error(`FAIL [${model}] after ${MAX_RETRIES} attempts: ${errorMessage(error)}`);
				throw error;
			}
			await handleRetry(error, model, attempt, signal);
		}
	}
}

async function callAnthropic(model: string, request: CompletionRequest, signal?: AbortSignal): Promise<string> {
	const client = getAnthropicClient();

	return withRetry(model, signal, async () => {
		const response = await client.messages.create(
			{
				model,
				max_tokens: request.maxTokens ?? 500,
				temperature: request.temperature ?? 0.1,
				system: request.system,
				messages: [{ role: "user", content: request.prompt }],
			},
			{ signal }
		);

		const textBlock = response.content.find((block) => block.type === "text");
		return textBlock && textBlock.type === "text" ? textBlock.text : "";
	});
}

async function callOpenAI(model: string, request: CompletionRequest, signal?: AbortSignal): Promise<string> {
	const client = getOpenAIClient();

	return withRetry(model, signal, async () => {
		const params: ChatCompletionCreateParamsNonStreaming = {
			model,
			max_tokens: request.maxTokens ?? 500,
			temperature: request.temperature ?? 0.1,
			messages: [
				{ role: "system", content: request.system },
				{ role: "user", content: request.prompt },
			],
		};

		const response = await client.chat.completions.create(params, { signal });
		return response.choices[0]?.message?.content || "";
	});
}

// Small, cheap model: one call per candidate post
export const callFast: Complete = (request, signal) => {
	if (provider() === "anthropic") {
		return callAnthropic("claude-3-5-haiku-20241022", request, signal);
	}
	return callOpenAI("gpt-4o-mini", request, signal);
};
