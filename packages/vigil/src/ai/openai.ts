// =============================================================================
// OPENAI CLIENTS -- chat-completion analyzer and embedding client
// =============================================================================

import type { AiAnalyzer, Embedder } from "@vigil/core";
import { VigilError } from "@vigil/core";
import OpenAI from "openai";

export interface OpenAiAnalyzerOptions {
	apiKey?: string;
	/** Default: "gpt-4o" */
	model?: string;
	/** Default: 0.1 */
	temperature?: number;
	/** Default: 1024 */
	maxTokens?: number;
	/** Pre-built client, e.g. one pointed at a compatible gateway. */
	client?: OpenAI;
}

export function createOpenAiAnalyzer(options: OpenAiAnalyzerOptions = {}): AiAnalyzer {
	const client = options.client ?? new OpenAI({ apiKey: options.apiKey });
	const model = options.model ?? "gpt-4o";

	return {
		async analyze(request) {
			const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
			if (request.system) messages.push({ role: "system", content: request.system });
			messages.push({ role: "user", content: request.prompt });

			let content: string | null | undefined;
			try {
				const response = await client.chat.completions.create({
					model,
					messages,
					max_tokens: options.maxTokens ?? 1024,
					temperature: options.temperature ?? 0.1,
				});
				content = response.choices[0]?.message?.content;
			} catch (error) {
				throw VigilError.aiUnavailable(`OpenAI ${request.purpose} analysis failed`, error);
			}
			if (!content) {
				throw VigilError.aiUnavailable(`OpenAI returned an empty ${request.purpose} completion`);
			}
			return content;
		},
	};
}

export interface OpenAiEmbedderOptions {
	apiKey?: string;
	/** Default: "text-embedding-3-small" */
	model?: string;
	/** Default: 1024 */
	dimension?: number;
	client?: OpenAI;
}

export function createOpenAiEmbedder(options: OpenAiEmbedderOptions = {}): Embedder {
	const client = options.client ?? new OpenAI({ apiKey: options.apiKey });
	const model = options.model ?? "text-embedding-3-small";
	const dimension = options.dimension ?? 1024;

	return {
		dimension,
		async embed(text) {
			let vector: number[] | undefined;
			try {
				const response = await client.embeddings.create({ model, input: text, dimensions: dimension });
				vector = response.data[0]?.embedding;
			} catch (error) {
				throw VigilError.aiUnavailable("OpenAI embedding request failed", error);
			}
			if (!vector || vector.length !== dimension) {
				throw VigilError.aiUnavailable(
					`OpenAI embedding has length ${vector?.length ?? 0}, expected ${dimension}`,
				);
			}
			return vector;
		},
	};
}
