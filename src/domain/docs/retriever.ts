import type { Logger } from "../../logger/logger.js";
import { errorMessage } from "../errors.js";
import type { SemanticSearch } from "../semantic/service.js";
import { DEFAULT_DOC_TYPE_VOCABULARY, detectDocType, type DocTypeVocabulary } from "./docType.js";
import { createKeywordSearch, DEFAULT_SCORING, type KeywordSearch } from "./keywordSearch.js";
import type { DocsRepository } from "./repository.js";
import type {
	DocType,
	ScoringConfig,
	SearchFallback,
	SearchRequest,
	SearchResponse,
} from "./types.js";

export const DEFAULT_LIMIT = 5;
export const MAX_LIMIT = 200;

export interface DocsRetrieverConfig {
	repository: DocsRepository;
	semantic?: SemanticSearch | null;
	scoring?: Partial<Record<DocType, ScoringConfig>>;
	vectorFilters?: Partial<Record<DocType, string>>;
	vocabulary?: DocTypeVocabulary;
	defaultDocType?: DocType;
	defaultLimit?: number;
	maxLimit?: number;
	maxContentLength?: number;
	logger?: Logger;
}

export interface DocsRetriever {
	readonly semanticAvailable: boolean;
	resolveDocType(query: string, requested?: DocType | "auto"): DocType;
	search(request: SearchRequest): Promise<SearchResponse>;
}

export function normalizeLimit(limit: number | undefined, defaultLimit: number, maxLimit: number): number {
	if (limit === undefined) return defaultLimit;
	if (!Number.isFinite(limit)) return 0;
	return Math.min(Math.floor(limit), maxLimit);
}

/**
 * Semantic search first when asked for and configured, keyword search otherwise
 * or when the semantic attempt fails. One mode per response, recorded in it.
 */
export function createDocsRetriever(config: DocsRetrieverConfig): DocsRetriever {
	const semantic = config.semantic ?? null;
	const defaultDocType = config.defaultDocType ?? "cedar";
	const defaultLimit = config.defaultLimit ?? DEFAULT_LIMIT;
	const maxLimit = config.maxLimit ?? MAX_LIMIT;
	const vocabulary = config.vocabulary ?? DEFAULT_DOC_TYPE_VOCABULARY;
	const log = config.logger;

	const keywordSearches = new Map<DocType, KeywordSearch>();
	for (const docType of config.repository.docTypes) {
		keywordSearches.set(
			docType,
			createKeywordSearch(
				config.repository.getIndex(docType),
				config.scoring?.[docType] ?? DEFAULT_SCORING,
				{ maxContentLength: config.maxContentLength },
			),
		);
	}

	function resolveDocType(query: string, requested?: DocType | "auto"): DocType {
		if (requested && requested !== "auto") return requested;
		return detectDocType(query, vocabulary, defaultDocType);
	}

	function keywordResponse(
		query: string,
		docType: DocType,
		limit: number,
		fallback?: SearchFallback,
	): SearchResponse {
		const keyword = keywordSearches.get(docType);
		return {
			query,
			docType,
			mode: "keyword",
			results: keyword ? keyword.search(query, limit) : [],
			...(fallback ? { fallback } : {}),
		};
	}

	return {
		semanticAvailable: semantic !== null,

		resolveDocType,

		async search(request: SearchRequest): Promise<SearchResponse> {
			const query = request.query.trim();
			const limit = normalizeLimit(request.limit, defaultLimit, maxLimit);
			const docType = resolveDocType(query, request.docType);

			if (!query || limit <= 0) {
				return { query, docType, mode: "keyword", results: [] };
			}

			if (!request.useSemantic) {
				return keywordResponse(query, docType, limit);
			}

			if (!semantic) {
				log?.debug({ docType }, "semantic search requested but not configured");
				return keywordResponse(query, docType, limit, {
					from: "semantic",
					reason: "semantic search is not configured",
				});
			}

			try {
				const results = await semantic.search(query, {
					limit,
					filter: config.vectorFilters?.[docType],
					signal: request.signal,
				});
				return { query, docType, mode: "semantic", results };
			} catch (error) {
				const reason = errorMessage(error);
				log?.warn({ docType, err: reason }, "semantic search failed, falling back to keyword search");
				return keywordResponse(query, docType, limit, { from: "semantic", reason });
			}
		},
	};
}
