import { queryTokens, suffixVariants } from "./tokenizer.js";
import { DOC_TYPES, type DocType } from "./types.js";

export type DocTypeVocabulary = Readonly<Partial<Record<DocType, readonly string[]>>>;

/**
 * Indicator terms that route an unpinned query to a corpus other than the default
 */
export const DEFAULT_DOC_TYPE_VOCABULARY: DocTypeVocabulary = {
	mastra: [
		"mastra",
		"backend",
		"workflow",
		"agent",
		"tool",
		"memory",
		"mcp",
		"server",
		"jwt",
		"auth",
		"authentication",
		"runtime",
		"rag",
		"eval",
		"step",
		"deployer",
	],
};

/**
 * Pick the corpus whose indicator terms the query hits most; ties and misses go to the default
 */
export function detectDocType(
	query: string,
	vocabulary: DocTypeVocabulary = DEFAULT_DOC_TYPE_VOCABULARY,
	fallback: DocType = "cedar",
): DocType {
	const forms = new Set(queryTokens(query).flatMap(token => suffixVariants(token)));

	let best: DocType = fallback;
	let bestHits = 0;

	for (const docType of DOC_TYPES) {
		const terms = vocabulary[docType];
		if (!terms) continue;

		const hits = terms.filter(term => forms.has(term)).length;
		if (hits > bestHits) {
			best = docType;
			bestHits = hits;
		}
	}

	return best;
}
