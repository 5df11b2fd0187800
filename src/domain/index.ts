/**
 * Domain layer public API
 * This is the main entry point for all domain services and repositories
 */

// ============================================================================
// Docs Domain
// ============================================================================

export type { DocsService } from "./docs/service.js";
export { createDocsService } from "./docs/service.js";

export type { DocsRepository, CorpusConfig, LoadDocsRepositoryOptions } from "./docs/repository.js";
export { createDocsRepository, loadDocsRepository } from "./docs/repository.js";

export type { DocsRetriever, DocsRetrieverConfig } from "./docs/retriever.js";
export { createDocsRetriever, DEFAULT_LIMIT, MAX_LIMIT } from "./docs/retriever.js";

export type { DocsSource, DocsSourceConfig } from "./docs/sourceFs.js";
export { createFsDocsSource } from "./docs/sourceFs.js";

export { buildDocIndex, describeIndex } from "./docs/indexer.js";
export { chunkSource } from "./docs/chunker.js";
export { createKeywordSearch, DEFAULT_SCORING } from "./docs/keywordSearch.js";
export { detectDocType } from "./docs/docType.js";
export { loadBuiltinSource } from "./docs/builtin.js";

// Re-export commonly used docs types
export { DOC_TYPES } from "./docs/types.js";
export type {
	DocType,
	DocSource,
	DocumentChunk,
	DocIndex,
	DocsIndexSummary,
	ScoringConfig,
	SearchRequest,
	SearchResponse,
	SearchResult,
	KeywordSearchResult,
	SemanticSearchResult,
	Citations,
} from "./docs/types.js";

// ============================================================================
// Semantic Search
// ============================================================================

export type { SemanticSearch, SemanticSearchConfig } from "./semantic/service.js";
export { createSemanticSearch } from "./semantic/service.js";
export { createOpenAIEmbeddings } from "./semantic/openaiEmbeddings.js";
export { createSupabaseVectorStore } from "./semantic/supabaseVectorStore.js";
export type { EmbeddingProvider, VectorStore, VectorMatch } from "./semantic/types.js";

// ============================================================================
// Errors
// ============================================================================

export { DocsError, DocsSourceError, SemanticSearchError } from "./errors.js";
