import type { Logger } from "../../logger/logger.js";
import { errorMessage } from "../errors.js";
import { loadBuiltinSource } from "./builtin.js";
import { buildDocIndex, describeIndex } from "./indexer.js";
import { createFsDocsSource } from "./sourceFs.js";
import type {
	ChunkingOptions,
	DocIndex,
	DocSource,
	DocType,
	DocsIndexSummary,
	TokenizerOptions,
} from "./types.js";

/**
 * Where one corpus comes from
 */
export interface CorpusConfig {
	docType: DocType;
	docsPath: string | null;
	patterns?: string[];
	includeBuiltin?: boolean;
}

export interface LoadDocsRepositoryOptions {
	corpora: readonly CorpusConfig[];
	chunking?: ChunkingOptions;
	tokenizer?: TokenizerOptions;
	builtinDir?: string;
	logger?: Logger;
}

/**
 * Read-only view over the indexes built at startup
 */
export interface DocsRepository {
	readonly docTypes: readonly DocType[];
	getIndex(docType: DocType): DocIndex;
	describe(docType: DocType): DocsIndexSummary;
}

export function createDocsRepository(indexes: readonly DocIndex[]): DocsRepository {
	const byType = new Map<DocType, DocIndex>();
	for (const index of indexes) {
		byType.set(index.docType, index);
	}

	function getIndex(docType: DocType): DocIndex {
		let index = byType.get(docType);
		if (!index) {
			index = buildDocIndex({ docType, sources: [] });
			byType.set(docType, index);
		}
		return index;
	}

	return {
		docTypes: Object.freeze(Array.from(byType.keys())),
		getIndex,
		describe(docType: DocType): DocsIndexSummary {
			return describeIndex(getIndex(docType));
		},
	};
}

async function loadCorpusSources(
	corpus: CorpusConfig,
	options: LoadDocsRepositoryOptions,
	log: Logger | undefined,
): Promise<DocSource[]> {
	const sources: DocSource[] = [];

	if (corpus.includeBuiltin ?? true) {
		try {
			sources.push(await loadBuiltinSource(corpus.docType, options.builtinDir));
		} catch (error) {
			log?.error({ docType: corpus.docType, err: errorMessage(error) }, "built-in docs are missing");
		}
	}

	if (corpus.docsPath) {
		const fsSource = createFsDocsSource({
			rootPath: corpus.docsPath,
			patterns: corpus.patterns,
			logger: log,
		});
		sources.push(...(await fsSource.load()));
	}

	return sources;
}

/**
 * Load every corpus and build its index once
 */
export async function loadDocsRepository(options: LoadDocsRepositoryOptions): Promise<DocsRepository> {
	const indexes: DocIndex[] = [];

	for (const corpus of options.corpora) {
		const log = options.logger?.child({ docType: corpus.docType });
		const sources = await loadCorpusSources(corpus, options, log);
		const index = buildDocIndex({
			docType: corpus.docType,
			docsPath: corpus.docsPath,
			sources,
			chunking: options.chunking,
			tokenizer: options.tokenizer,
			logger: log,
		});

		log?.info(
			{ chunkCount: index.chunks.length, sources: index.sources.size, docsPath: corpus.docsPath },
			"documentation index built",
		);
		indexes.push(index);
	}

	return createDocsRepository(indexes);
}
