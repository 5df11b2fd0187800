import type { DocType, ScoringConfig } from "../domain/docs/types.js";
import type { CorpusConfig } from "../domain/docs/repository.js";
import type { EnvConfig } from "./envConfig.js";
import { uriToFsPath } from "./security.js";

/**
 * Importance table per corpus: added once per matched query term
 */
export const DEFAULT_TERM_BONUS: Readonly<Record<DocType, Readonly<Record<string, number>>>> = {
	cedar: {
		cedar: 2,
	},
	mastra: {
		mastra: 2,
		agent: 2,
		workflow: 2,
		tool: 2,
		memory: 2,
	},
};

export interface SemanticSettings {
	supabaseUrl: string;
	supabaseKey: string;
	matchFunction: string;
	openaiApiKey: string;
	openaiBaseUrl?: string;
	embeddingModel: string;
	embeddingDimensions: number;
	threshold: number;
	timeoutMs: number;
}

export interface DocsSettings {
	corpora: CorpusConfig[];
	maxChunkSize: number;
	maxContentLength: number;
	scoring: Record<DocType, ScoringConfig>;
	vectorFilters: Partial<Record<DocType, string>>;
	semantic: SemanticSettings | null;
	logLevel: EnvConfig["DOCS_LOG_LEVEL"];
}

function positive(value: number, fallback: number): number {
	const whole = Math.floor(value);
	return whole >= 1 ? whole : fallback;
}

function scoringFor(docType: DocType, env: EnvConfig): ScoringConfig {
	return {
		contentWeight: 1,
		headingBoost: env.DOCS_HEADING_BOOST,
		termBonus: Object.fromEntries([
			...Object.entries(DEFAULT_TERM_BONUS[docType]),
			...Object.entries(env.DOCS_TERM_BONUS ?? {}),
		]),
	};
}

/**
 * Semantic search needs both the vector store and the embedding provider;
 * anything less means keyword-only, which is not an error.
 */
export function resolveSemanticSettings(env: EnvConfig): SemanticSettings | null {
	if (!env.SUPABASE_URL || !env.SUPABASE_KEY || !env.OPENAI_API_KEY) {
		return null;
	}

	return {
		supabaseUrl: env.SUPABASE_URL,
		supabaseKey: env.SUPABASE_KEY,
		matchFunction: env.SUPABASE_MATCH_FUNCTION,
		openaiApiKey: env.OPENAI_API_KEY,
		openaiBaseUrl: env.OPENAI_BASE_URL,
		embeddingModel: env.EMBEDDING_MODEL,
		embeddingDimensions: positive(env.EMBEDDING_DIMENSIONS, 512),
		threshold: env.SEMANTIC_SIMILARITY_THRESHOLD,
		timeoutMs: positive(env.SEMANTIC_TIMEOUT_MS, 8000),
	};
}

export function resolveDocsSettings(env: EnvConfig): DocsSettings {
	const docsPathFor = (raw: string | undefined): string | null => (raw ? uriToFsPath(raw) : null);

	const vectorFilters: Partial<Record<DocType, string>> = {};
	if (env.CEDAR_VECTOR_FILTER) vectorFilters.cedar = env.CEDAR_VECTOR_FILTER;
	if (env.MASTRA_VECTOR_FILTER) vectorFilters.mastra = env.MASTRA_VECTOR_FILTER;

	return {
		corpora: [
			{ docType: "cedar", docsPath: docsPathFor(env.CEDAR_DOCS_PATH), patterns: env.DOCS_PATTERNS },
			{ docType: "mastra", docsPath: docsPathFor(env.MASTRA_DOCS_PATH), patterns: env.DOCS_PATTERNS },
		],
		maxChunkSize: positive(env.DOCS_MAX_CHUNK_SIZE, 2000),
		maxContentLength: positive(env.DOCS_MAX_CONTENT_LENGTH, 2000),
		scoring: {
			cedar: scoringFor("cedar", env),
			mastra: scoringFor("mastra", env),
		},
		vectorFilters,
		semantic: resolveSemanticSettings(env),
		logLevel: env.DOCS_LOG_LEVEL,
	};
}
