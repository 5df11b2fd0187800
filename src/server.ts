import { readFileSync } from "node:fs";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DocsSettings } from "./config/settings.js";
import {
	createDocsRetriever,
	createDocsService,
	createOpenAIEmbeddings,
	createSemanticSearch,
	createSupabaseVectorStore,
	loadDocsRepository,
	type DocsService,
	type SemanticSearch,
} from "./domain/index.js";
import { registerDocsFeatures } from "./features/docs/index.js";
import type { Logger } from "./logger/logger.js";

const PackageJsonSchema = z.object({
	name: z.string(),
	version: z.string(),
});

const packageJson = PackageJsonSchema.parse(
	JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")),
);

const SERVER_NAME = packageJson.name;
const SERVER_VERSION = packageJson.version;

function createSemanticFromSettings(settings: DocsSettings): SemanticSearch | null {
	const semantic = settings.semantic;
	if (!semantic) return null;

	return createSemanticSearch({
		embedder: createOpenAIEmbeddings({
			apiKey: semantic.openaiApiKey,
			baseUrl: semantic.openaiBaseUrl,
			model: semantic.embeddingModel,
			dimensions: semantic.embeddingDimensions,
		}),
		store: createSupabaseVectorStore({
			url: semantic.supabaseUrl,
			key: semantic.supabaseKey,
			matchFunction: semantic.matchFunction,
		}),
		threshold: semantic.threshold,
		timeoutMs: semantic.timeoutMs,
		maxContentLength: settings.maxContentLength,
	});
}

/**
 * Load every corpus, build the indexes once and wire the retriever over them
 */
export async function createDocsRuntime(settings: DocsSettings, logger: Logger): Promise<DocsService> {
	const repository = await loadDocsRepository({
		corpora: settings.corpora,
		chunking: { maxChunkSize: settings.maxChunkSize },
		logger: logger.child({ component: "indexer" }),
	});

	const semantic = createSemanticFromSettings(settings);
	logger.info(
		{ semantic: semantic ? semantic.description : "disabled" },
		semantic ? "semantic search enabled" : "semantic search not configured, using keyword search",
	);

	const retriever = createDocsRetriever({
		repository,
		semantic,
		scoring: settings.scoring,
		vectorFilters: settings.vectorFilters,
		maxContentLength: settings.maxContentLength,
		logger: logger.child({ component: "retriever" }),
	});

	return createDocsService(repository, retriever);
}

export function buildDocsServer(docsService: DocsService): McpServer {
	const server = new McpServer(
		{
			name: SERVER_NAME,
			version: SERVER_VERSION,
		},
		{
			capabilities: {
				tools: {},
				resources: {},
			},
		},
	);

	registerDocsFeatures(server, docsService);

	return server;
}
