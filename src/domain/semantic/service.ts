import type { SemanticSearchResult } from "../docs/types.js";
import { withDeadline } from "./deadline.js";
import type { EmbeddingProvider, VectorMatch, VectorStore } from "./types.js";

export interface SemanticSearchConfig {
	embedder: EmbeddingProvider;
	store: VectorStore;
	threshold?: number;
	timeoutMs?: number;
	maxContentLength?: number;
}

export interface SemanticQueryOptions {
	limit: number;
	filter?: string;
	signal?: AbortSignal;
}

/**
 * Vector-similarity search. Rejects with SemanticSearchError on any failure;
 * the retriever decides what to do about it.
 */
export interface SemanticSearch {
	readonly description: string;
	search(query: string, options: SemanticQueryOptions): Promise<SemanticSearchResult[]>;
}

function stringField(metadata: Record<string, unknown>, key: string): string | undefined {
	const value = metadata[key];
	return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function headingOf(metadata: Record<string, unknown>): string {
	const sectionTitle = stringField(metadata, "section_title");
	if (sectionTitle) return sectionTitle;

	const headers = metadata.headers;
	if (Array.isArray(headers)) {
		return headers.filter((header): header is string => typeof header === "string").join(" > ");
	}
	return "";
}

export function toSemanticResult(match: VectorMatch, maxContentLength: number): SemanticSearchResult | null {
	const content = (match.content ?? stringField(match.metadata, "text") ?? "").trim();
	if (!content) return null;

	const url = stringField(match.metadata, "url");

	return {
		...(match.id ? { id: match.id } : {}),
		source: stringField(match.metadata, "source_label") ?? url ?? "vector-store",
		heading: headingOf(match.metadata),
		content: content.slice(0, maxContentLength),
		...(url ? { url } : {}),
		similarity: match.similarity,
		metadata: match.metadata,
	};
}

export function createSemanticSearch(config: SemanticSearchConfig): SemanticSearch {
	const threshold = config.threshold ?? 0.5;
	const timeoutMs = config.timeoutMs ?? 8000;
	const maxContentLength = config.maxContentLength ?? 2000;

	return {
		description: `${config.embedder.name} embeddings (${config.embedder.dimensions}d) + ${config.store.name}`,

		async search(query: string, options: SemanticQueryOptions): Promise<SemanticSearchResult[]> {
			return withDeadline(
				async signal => {
					const embedding = await config.embedder.embed(query, signal);
					const matches = await config.store.match({
						embedding,
						threshold,
						count: options.limit,
						filter: options.filter,
						signal,
					});

					return matches
						.filter(match => match.similarity >= threshold)
						.map(match => toSemanticResult(match, maxContentLength))
						.filter((result): result is SemanticSearchResult => result !== null)
						.sort((a, b) => b.similarity - a.similarity)
						.slice(0, options.limit);
				},
				{ timeoutMs, signal: options.signal },
			);
		},
	};
}
