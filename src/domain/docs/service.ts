import { z } from "zod";
import type { DocsRepository } from "./repository.js";
import type { DocsRetriever } from "./retriever.js";
import { DOC_TYPES, type DocType, type DocsIndexSummary, type SearchResponse } from "./types.js";

const SearchRequestSchema = z.object({
	query: z.string(),
	limit: z.number().optional(),
	useSemantic: z.boolean().optional(),
	docType: z.union([z.enum(DOC_TYPES), z.literal("auto")]).optional(),
	signal: z.instanceof(AbortSignal).optional(),
});

/**
 * Service interface for documentation operations
 * Facade over DocsRepository and DocsRetriever for the MCP layer
 */
export interface DocsService {
	/**
	 * Search documentation; never rejects.
	 * A request that does not validate gets an empty keyword response.
	 */
	search(request: unknown): Promise<SearchResponse>;

	/**
	 * Summary of one corpus index
	 */
	describe(docType: DocType): DocsIndexSummary;

	describeAll(): DocsIndexSummary[];

	readonly semanticAvailable: boolean;
}

export function createDocsService(repository: DocsRepository, retriever: DocsRetriever): DocsService {
	return {
		semanticAvailable: retriever.semanticAvailable,

		async search(request: unknown): Promise<SearchResponse> {
			const parsed = SearchRequestSchema.safeParse(request);
			if (!parsed.success) {
				return { query: "", docType: retriever.resolveDocType(""), mode: "keyword", results: [] };
			}
			return retriever.search(parsed.data);
		},

		describe(docType: DocType): DocsIndexSummary {
			return repository.describe(docType);
		},

		describeAll(): DocsIndexSummary[] {
			return repository.docTypes.map(docType => repository.describe(docType));
		},
	};
}
