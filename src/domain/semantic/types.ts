/**
 * Adapters behind semantic search. Nothing outside the semantic module talks to them.
 */

export interface EmbeddingProvider {
	readonly name: string;
	readonly dimensions: number;
	embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface VectorMatchParams {
	embedding: readonly number[];
	threshold: number;
	count: number;
	filter?: string;
	signal?: AbortSignal;
}

export interface VectorMatch {
	id?: string;
	content: string | null;
	metadata: Record<string, unknown>;
	similarity: number;
}

export interface VectorStore {
	readonly name: string;
	match(params: VectorMatchParams): Promise<VectorMatch[]>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
