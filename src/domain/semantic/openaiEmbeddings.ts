import { z } from "zod";
import { errorMessage, SemanticSearchError } from "../errors.js";
import type { EmbeddingProvider, FetchLike } from "./types.js";

const EmbeddingResponseSchema = z.object({
	data: z
		.array(
			z.object({
				embedding: z.array(z.number()),
				index: z.number(),
			}),
		)
		.min(1),
	model: z.string(),
});

const ErrorResponseSchema = z.object({
	error: z.object({
		message: z.string(),
	}),
});

export interface OpenAIEmbeddingsConfig {
	apiKey: string;
	baseUrl?: string;
	model?: string;
	dimensions?: number;
	fetch?: FetchLike;
}

/**
 * OpenAI embeddings with a fixed output size (text-embedding-3-* honour `dimensions`)
 */
export function createOpenAIEmbeddings(config: OpenAIEmbeddingsConfig): EmbeddingProvider {
	const baseUrl = (config.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
	const model = config.model ?? "text-embedding-3-small";
	const dimensions = config.dimensions ?? 512;
	const doFetch: FetchLike = config.fetch ?? ((input, init) => fetch(input, init));

	return {
		name: "openai",
		dimensions,

		async embed(text: string, signal?: AbortSignal): Promise<number[]> {
			let response: Response;
			try {
				response = await doFetch(`${baseUrl}/embeddings`, {
					method: "POST",
					headers: {
						Authorization: `Bearer ${config.apiKey}`,
						"Content-Type": "application/json",
					},
					body: JSON.stringify({ input: text, model, dimensions }),
					signal,
				});
			} catch (error) {
				throw new SemanticSearchError(
					"EMBEDDING_FAILED",
					`Embedding request failed: ${errorMessage(error)}`,
					{ provider: "openai" },
					error,
				);
			}

			const body: unknown = await response.json().catch(() => null);

			if (!response.ok) {
				const parsedError = ErrorResponseSchema.safeParse(body);
				const detail = parsedError.success ? parsedError.data.error.message : response.statusText;
				throw new SemanticSearchError(
					"EMBEDDING_FAILED",
					`Embedding request failed with HTTP ${response.status}: ${detail}`,
					{ provider: "openai", status: response.status },
				);
			}

			const parsed = EmbeddingResponseSchema.safeParse(body);
			if (!parsed.success) {
				throw new SemanticSearchError(
					"MALFORMED_RESPONSE",
					"Embedding response did not match the expected shape",
					{ provider: "openai" },
					parsed.error,
				);
			}

			const embedding = parsed.data.data[0].embedding;
			if (embedding.length !== dimensions) {
				throw new SemanticSearchError(
					"MALFORMED_RESPONSE",
					`Expected a ${dimensions}-dimensional embedding, got ${embedding.length}`,
					{ provider: "openai", model: parsed.data.model },
				);
			}

			return embedding;
		},
	};
}
