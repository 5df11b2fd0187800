import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DOC_TYPES, type DocsService, type SearchResponse, type SearchResult } from "../../domain/index.js";
import { CITATION_GUIDANCE, MASTRA_SEARCH_SUGGESTION, SNIPPET_LENGTH } from "../shared/consts.js";

const SearchResultSchema = z.object({
	id: z.string().optional(),
	source: z.string(),
	heading: z.string(),
	content: z.string(),
	url: z.string().optional(),
	section: z.string().optional(),
	matchCount: z.number().optional(),
	similarity: z.number().optional(),
	matchedTokens: z.record(z.string(), z.number()).optional(),
	citations: z
		.object({
			source: z.string(),
			approxSpan: z.object({ start: z.number(), end: z.number() }),
			lines: z.object({ start: z.number(), end: z.number() }),
			tokenLines: z.record(z.string(), z.array(z.number())),
		})
		.optional(),
	metadata: z.record(z.string(), z.unknown()).optional(),
});

const SearchOutputSchema = z.object({
	query: z.string(),
	docType: z.enum(DOC_TYPES),
	mode: z.enum(["keyword", "semantic"]),
	results: z.array(SearchResultSchema),
	fallback: z
		.object({
			from: z.literal("semantic"),
			reason: z.string(),
		})
		.optional(),
});

const SearchDocsInputSchema = z.object({
	query: z.string().describe("Search query"),
	limit: z.number().optional().default(5).describe("Maximum number of results (capped at 200)"),
	useSemantic: z
		.boolean()
		.optional()
		.default(false)
		.describe("Prefer vector similarity search when it is configured"),
	doc_type: z
		.enum(["cedar", "mastra", "auto"])
		.optional()
		.default("auto")
		.describe("Corpus to search; 'auto' routes backend/agent/workflow questions to the Mastra docs"),
});

const SearchMastraDocsInputSchema = SearchDocsInputSchema.omit({ doc_type: true }).extend({
	query: z.string().describe("Search query for Mastra concepts"),
});

function describeLocation(result: SearchResult): string {
	if ("citations" in result) {
		const { start, end } = result.citations.lines;
		return `${result.source} (lines ${start === end ? start : `${start}-${end}`})`;
	}
	return result.source;
}

function describeScore(result: SearchResult): string {
	if ("similarity" in result) {
		return `similarity ${result.similarity.toFixed(3)}`;
	}
	const tokens = Object.entries(result.matchedTokens)
		.map(([token, count]) => {
			const { tokenLines } = result.citations;
			return Object.hasOwn(tokenLines, token)
				? `${token}×${count} @ ${tokenLines[token].join(",")}`
				: `${token}×${count}`;
		})
		.join("; ");
	return `score ${result.matchCount}${tokens ? ` (${tokens})` : ""}`;
}

export function renderSearchResponse(response: SearchResponse, emptyHint?: string): string {
	let text = `Found ${response.results.length} results for "${response.query}" in ${response.docType} docs (${response.mode} search)`;
	if (response.fallback) {
		text += `\nSemantic search unavailable: ${response.fallback.reason}`;
	}
	text += "\n\n";

	response.results.forEach((result, i) => {
		const snippet = result.content.slice(0, SNIPPET_LENGTH);
		text += `${i + 1}. ${result.heading || "(no heading)"}\n`;
		text += `   ${describeLocation(result)}, ${describeScore(result)}\n`;
		if (result.url) text += `   ${result.url}\n`;
		if ("section" in result && result.section) text += `   section: ${result.section}\n`;
		text += `   ${snippet}${result.content.length > SNIPPET_LENGTH ? "..." : ""}\n\n`;
	});

	if (response.results.length === 0 && emptyHint) {
		text += `${emptyHint}\n\n`;
	}

	return text + CITATION_GUIDANCE;
}

function toStructured(response: SearchResponse): Record<string, unknown> {
	return {
		query: response.query,
		docType: response.docType,
		mode: response.mode,
		results: response.results,
		...(response.fallback ? { fallback: response.fallback } : {}),
	};
}

/**
 * Tool: searchDocs
 * Search the documentation corpora, routing by doc_type
 */
export function registerSearchDocsTool(server: McpServer, docsService: DocsService): void {
	server.registerTool(
		"searchDocs",
		{
			title: "Search documentation",
			description:
				"Search the Cedar and Mastra documentation for relevant sections. Returns ranked chunks with source files and line citations.",
			inputSchema: SearchDocsInputSchema,
			outputSchema: SearchOutputSchema,
			annotations: {
				readOnlyHint: true,
				idempotentHint: true,
				openWorldHint: false,
			},
		},
		async ({ query, limit, useSemantic, doc_type }) => {
			const response = await docsService.search({ query, limit, useSemantic, docType: doc_type });

			return {
				content: [
					{
						type: "text",
						text: renderSearchResponse(response),
					},
				],
				structuredContent: toStructured(response),
			};
		},
	);
}

/**
 * Tool: searchMastraDocs
 * Same search, pinned to the Mastra corpus
 */
export function registerSearchMastraDocsTool(server: McpServer, docsService: DocsService): void {
	server.registerTool(
		"searchMastraDocs",
		{
			title: "Search Mastra documentation",
			description:
				"Search Mastra documentation for backend integration, agents, workflows, tools, and memory.",
			inputSchema: SearchMastraDocsInputSchema,
			outputSchema: SearchOutputSchema,
			annotations: {
				readOnlyHint: true,
				idempotentHint: true,
				openWorldHint: false,
			},
		},
		async ({ query, limit, useSemantic }) => {
			const response = await docsService.search({ query, limit, useSemantic, docType: "mastra" });

			return {
				content: [
					{
						type: "text",
						text: renderSearchResponse(response, MASTRA_SEARCH_SUGGESTION),
					},
				],
				structuredContent: toStructured(response),
			};
		},
	);
}
