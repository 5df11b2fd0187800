/**
 * Types for documentation indexing and retrieval
 */

export const DOC_TYPES = ["cedar", "mastra"] as const;

export type DocType = (typeof DOC_TYPES)[number];

/**
 * Raw documentation input, selected by its format
 */
export type DocSource =
	| { format: "text"; id: string; text: string }
	| { format: "json"; id: string; text: string };

export type DocSourceFormat = DocSource["format"];

export interface DocumentChunk {
	readonly source: string;
	readonly heading: string; // "" when the text has no enclosing heading
	readonly content: string; // whitespace-collapsed
	readonly startOffset: number; // into the raw source text
	readonly endOffset: number;
	readonly startLine: number; // 1-based
	readonly endLine: number;
	readonly url?: string;
	readonly section?: string; // url of the enclosing `[EN] Source:` section marker
}

export interface ChunkingOptions {
	maxChunkSize: number;
}

export interface TokenizerOptions {
	minTokenLength: number;
	shortTokens: ReadonlySet<string>;
	stopWords: ReadonlySet<string>;
}

/**
 * Keyword scoring weights, tunable per corpus
 */
export interface ScoringConfig {
	contentWeight: number;
	headingBoost: number;
	termBonus: Readonly<Record<string, number>>;
}

/**
 * Per-chunk token statistics (token and suffix variants → occurrences)
 */
export interface ChunkTokenStats {
	readonly content: ReadonlyMap<string, number>;
	readonly heading: ReadonlyMap<string, number>;
}

export interface SourceText {
	readonly text: string;
	readonly lineStarts: readonly number[];
}

export interface DocIndex {
	readonly docType: DocType;
	readonly docsPath: string | null;
	readonly chunks: readonly DocumentChunk[];
	readonly tokenStats: readonly ChunkTokenStats[];
	readonly tokenIndex: ReadonlyMap<string, readonly number[]>;
	readonly sources: ReadonlyMap<string, SourceText>;
	readonly tokenizer: TokenizerOptions;
	readonly builtAt: number;
}

export interface DocsIndexSummary {
	docType: DocType;
	docsPath: string | null;
	chunkCount: number;
	sources: string[];
	sections: string[]; // docs section names taken from section marker urls
	builtAt: number;
}

export interface Citations {
	source: string;
	approxSpan: { start: number; end: number };
	lines: { start: number; end: number };
	tokenLines: Record<string, number[]>;
}

export interface KeywordSearchResult {
	source: string;
	heading: string;
	content: string;
	url?: string;
	section?: string;
	matchCount: number;
	matchedTokens: Record<string, number>;
	citations: Citations;
}

export interface SemanticSearchResult {
	id?: string;
	source: string;
	heading: string;
	content: string;
	url?: string;
	similarity: number;
	metadata: Record<string, unknown>;
}

export type SearchResult = KeywordSearchResult | SemanticSearchResult;

export interface SearchFallback {
	from: "semantic";
	reason: string;
}

interface BaseSearchResponse {
	query: string;
	docType: DocType;
	fallback?: SearchFallback;
}

export type SearchResponse =
	| (BaseSearchResponse & { mode: "keyword"; results: KeywordSearchResult[] })
	| (BaseSearchResponse & { mode: "semantic"; results: SemanticSearchResult[] });

export interface SearchRequest {
	query: string;
	limit?: number;
	useSemantic?: boolean;
	docType?: DocType | "auto";
	signal?: AbortSignal;
}
