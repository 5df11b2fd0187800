import { basename } from "node:path";
import type { Logger } from "../../logger/logger.js";
import { errorMessage } from "../errors.js";
import { chunkSource, DEFAULT_CHUNKING_OPTIONS } from "./chunker.js";
import { computeLineStarts } from "./lines.js";
import { countTokens, DEFAULT_TOKENIZER_OPTIONS } from "./tokenizer.js";
import type {
	ChunkingOptions,
	ChunkTokenStats,
	DocIndex,
	DocSource,
	DocType,
	DocsIndexSummary,
	DocumentChunk,
	SourceText,
	TokenizerOptions,
} from "./types.js";

export interface BuildDocIndexOptions {
	docType: DocType;
	sources: readonly DocSource[];
	docsPath?: string | null;
	chunking?: ChunkingOptions;
	tokenizer?: TokenizerOptions;
	logger?: Logger;
}

/**
 * Build an immutable index over the given sources.
 * A source that fails to parse is logged and contributes nothing.
 */
export function buildDocIndex(options: BuildDocIndexOptions): DocIndex {
	const chunking = options.chunking ?? DEFAULT_CHUNKING_OPTIONS;
	const tokenizer = options.tokenizer ?? DEFAULT_TOKENIZER_OPTIONS;
	const log = options.logger;

	const chunks: DocumentChunk[] = [];
	const sources = new Map<string, SourceText>();

	for (const source of options.sources) {
		const lineStarts = computeLineStarts(source.text);
		let sourceChunks: DocumentChunk[];

		try {
			sourceChunks = chunkSource(source, lineStarts, chunking);
		} catch (error) {
			log?.warn(
				{ source: source.id, format: source.format, err: errorMessage(error) },
				"skipping documentation source",
			);
			continue;
		}

		sources.set(source.id, Object.freeze({ text: source.text, lineStarts: Object.freeze(lineStarts) }));
		chunks.push(...sourceChunks);
		log?.debug({ source: source.id, chunks: sourceChunks.length }, "indexed documentation source");
	}

	const tokenStats: ChunkTokenStats[] = [];
	const postings = new Map<string, number[]>();

	chunks.forEach((chunk, chunkIndex) => {
		const stats: ChunkTokenStats = {
			content: countTokens(chunk.content, tokenizer),
			heading: countTokens(chunk.heading, tokenizer),
		};
		tokenStats.push(stats);

		const keys = new Set([...stats.content.keys(), ...stats.heading.keys()]);
		for (const key of keys) {
			const list = postings.get(key);
			if (list) {
				list.push(chunkIndex);
			} else {
				postings.set(key, [chunkIndex]);
			}
		}
	});

	return Object.freeze({
		docType: options.docType,
		docsPath: options.docsPath ?? null,
		chunks: Object.freeze(chunks),
		tokenStats: Object.freeze(tokenStats),
		tokenIndex: postings,
		sources,
		tokenizer,
		builtAt: Date.now(),
	});
}

function displaySourceName(sourceId: string): string {
	return sourceId.startsWith("builtin:") ? sourceId : basename(sourceId);
}

const SECTION_NAME_RE = /\/docs\/([^/?#]+)/;

/**
 * "https://mastra.ai/en/docs/agents/overview" → "agents"
 */
export function sectionName(sectionUrl: string): string | null {
	return SECTION_NAME_RE.exec(sectionUrl)?.[1] ?? null;
}

export function describeIndex(index: DocIndex): DocsIndexSummary {
	const names = new Set(index.chunks.map(chunk => displaySourceName(chunk.source)));
	const sections = new Set<string>();
	for (const chunk of index.chunks) {
		const name = chunk.section ? sectionName(chunk.section) : null;
		if (name) sections.add(name);
	}

	return {
		docType: index.docType,
		docsPath: index.docsPath,
		chunkCount: index.chunks.length,
		sources: Array.from(names).sort(),
		sections: Array.from(sections).sort(),
		builtAt: index.builtAt,
	};
}
