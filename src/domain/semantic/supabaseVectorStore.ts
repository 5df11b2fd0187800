import { z } from "zod";
import { errorMessage, SemanticSearchError } from "../errors.js";
import type { FetchLike, VectorMatch, VectorMatchParams, VectorStore } from "./types.js";

/** Upper bound the match function applies to match_count */
export const MAX_MATCH_COUNT = 200;

const MatchRowSchema = z.object({
	id: z.union([z.string(), z.number()]).nullish(),
	content: z.string().nullish(),
	metadata: z.record(z.string(), z.unknown()).nullish(),
	similarity: z.number(),
});

const MatchRowsSchema = z.array(MatchRowSchema);

export interface SupabaseVectorStoreConfig {
	url: string;
	key: string;
	matchFunction?: string;
	fetch?: FetchLike;
}

/**
 * pgvector similarity search through a Supabase RPC
 * (`match_documents(query_embedding, match_threshold, match_count, product_filter)`)
 */
export function createSupabaseVectorStore(config: SupabaseVectorStoreConfig): VectorStore {
	const endpoint = `${config.url.replace(/\/+$/, "")}/rest/v1/rpc/${config.matchFunction ?? "match_documents"}`;
	const doFetch: FetchLike = config.fetch ?? ((input, init) => fetch(input, init));

	return {
		name: "supabase",

		async match(params: VectorMatchParams): Promise<VectorMatch[]> {
			let response: Response;
			try {
				response = await doFetch(endpoint, {
					method: "POST",
					headers: {
						apikey: config.key,
						Authorization: `Bearer ${config.key}`,
						"Content-Type": "application/json",
					},
					body: JSON.stringify({
						query_embedding: params.embedding,
						match_threshold: params.threshold,
						match_count: Math.min(params.count, MAX_MATCH_COUNT),
						product_filter: params.filter ?? null,
					}),
					signal: params.signal,
				});
			} catch (error) {
				throw new SemanticSearchError(
					"VECTOR_STORE_FAILED",
					`Vector store request failed: ${errorMessage(error)}`,
					{ store: "supabase" },
					error,
				);
			}

			if (!response.ok) {
				throw new SemanticSearchError(
					"VECTOR_STORE_FAILED",
					`Vector store request failed with HTTP ${response.status}`,
					{ store: "supabase", status: response.status },
				);
			}

			const body: unknown = await response.json().catch(() => null);
			const parsed = MatchRowsSchema.safeParse(body);
			if (!parsed.success) {
				throw new SemanticSearchError(
					"MALFORMED_RESPONSE",
					"Vector store response did not match the expected shape",
					{ store: "supabase" },
					parsed.error,
				);
			}

			return parsed.data.map(row => ({
				...(row.id !== null && row.id !== undefined ? { id: String(row.id) } : {}),
				content: row.content ?? null,
				metadata: row.metadata ?? {},
				similarity: row.similarity,
			}));
		},
	};
}
