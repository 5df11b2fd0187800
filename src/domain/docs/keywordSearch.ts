import { findWordLines } from "./lines.js";
import { queryTokens, suffixVariants } from "./tokenizer.js";
import type { Citations, DocIndex, DocumentChunk, KeywordSearchResult, ScoringConfig } from "./types.js";

export const DEFAULT_SCORING: ScoringConfig = {
	contentWeight: 1,
	headingBoost: 3,
	termBonus: {},
};

export interface KeywordSearchOptions {
	maxContentLength?: number;
	maxLinesPerToken?: number;
}

export interface KeywordSearch {
	search(query: string, limit: number): KeywordSearchResult[];
}

interface ScoredChunk {
	chunkIndex: number;
	score: number;
	matchedTokens: Record<string, number>;
}

function scoreChunk(
	index: DocIndex,
	chunkIndex: number,
	tokens: readonly string[],
	scoring: ScoringConfig,
): ScoredChunk {
	const stats = index.tokenStats[chunkIndex];
	const matchedTokens: Record<string, number> = {};
	let score = 0;

	for (const token of tokens) {
		const inContent = stats.content.get(token) ?? 0;
		const inHeading = stats.heading.get(token) ?? 0;
		if (inContent + inHeading === 0) continue;

		matchedTokens[token] = inContent + inHeading;
		score += inContent * scoring.contentWeight + inHeading * scoring.headingBoost;
		if (Object.hasOwn(scoring.termBonus, token)) score += scoring.termBonus[token];
	}

	return { chunkIndex, score, matchedTokens };
}

function buildCitations(
	index: DocIndex,
	chunk: DocumentChunk,
	matchedTokens: Record<string, number>,
	maxLinesPerToken: number,
): Citations {
	const tokenLines: Record<string, number[]> = {};
	const source = index.sources.get(chunk.source);

	if (source) {
		for (const token of Object.keys(matchedTokens)) {
			const lines = findWordLines(
				source.text,
				source.lineStarts,
				chunk.startOffset,
				chunk.endOffset,
				word => suffixVariants(word, index.tokenizer).includes(token),
				maxLinesPerToken,
			);
			if (lines.length > 0) tokenLines[token] = lines;
		}
	}

	return {
		source: chunk.source,
		approxSpan: { start: chunk.startOffset, end: chunk.endOffset },
		lines: { start: chunk.startLine, end: chunk.endLine },
		tokenLines,
	};
}

/**
 * Deterministic lexical ranking over one index
 */
export function createKeywordSearch(
	index: DocIndex,
	scoring: ScoringConfig = DEFAULT_SCORING,
	options: KeywordSearchOptions = {},
): KeywordSearch {
	const maxContentLength = options.maxContentLength ?? 2000;
	const maxLinesPerToken = options.maxLinesPerToken ?? 10;

	return {
		search(query: string, limit: number): KeywordSearchResult[] {
			if (limit <= 0) return [];

			const tokens = queryTokens(query, index.tokenizer);
			if (tokens.length === 0) return [];

			const candidates = new Set<number>();
			for (const token of tokens) {
				for (const chunkIndex of index.tokenIndex.get(token) ?? []) {
					candidates.add(chunkIndex);
				}
			}

			const scored = Array.from(candidates, chunkIndex => scoreChunk(index, chunkIndex, tokens, scoring))
				.filter(entry => entry.score > 0)
				.sort((a, b) => b.score - a.score || a.chunkIndex - b.chunkIndex)
				.slice(0, limit);

			return scored.map(({ chunkIndex, score, matchedTokens }) => {
				const chunk = index.chunks[chunkIndex];
				return {
					source: chunk.source,
					heading: chunk.heading,
					content: chunk.content.slice(0, maxContentLength),
					...(chunk.url ? { url: chunk.url } : {}),
					...(chunk.section ? { section: chunk.section } : {}),
					matchCount: score,
					matchedTokens,
					citations: buildCitations(index, chunk, matchedTokens, maxLinesPerToken),
				};
			});
		},
	};
}
