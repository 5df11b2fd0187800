import { z } from "zod";

const optionalNumber = (fallback: number) =>
	z
		.string()
		.optional()
		.transform(val => {
			const parsed = val === undefined || val.trim() === "" ? Number.NaN : Number(val);
			return Number.isFinite(parsed) ? parsed : fallback;
		});

const optionalText = z
	.string()
	.optional()
	.transform(val => (val && val.trim() ? val.trim() : undefined));

const TermBonusSchema = z.record(z.string(), z.number());

const EnvSchema = z.object({
	// Corpus sources
	CEDAR_DOCS_PATH: optionalText,
	MASTRA_DOCS_PATH: optionalText,
	DOCS_PATTERNS: z
		.string()
		.optional()
		.transform(val => (val ? val.split(",").map(p => p.trim()).filter(Boolean) : undefined)),
	// Chunking and scoring
	DOCS_MAX_CHUNK_SIZE: optionalNumber(2000),
	DOCS_MAX_CONTENT_LENGTH: optionalNumber(2000),
	DOCS_HEADING_BOOST: optionalNumber(3),
	DOCS_TERM_BONUS: z
		.string()
		.optional()
		.transform((val, ctx) => {
			if (!val) return undefined;
			try {
				return TermBonusSchema.parse(JSON.parse(val));
			} catch {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: 'DOCS_TERM_BONUS must be a JSON object of numbers, e.g. {"workflow":2}',
				});
				return z.NEVER;
			}
		}),
	// Semantic search
	SUPABASE_URL: optionalText,
	SUPABASE_KEY: optionalText,
	SUPABASE_MATCH_FUNCTION: z.string().optional().default("match_documents"),
	OPENAI_API_KEY: optionalText,
	OPENAI_BASE_URL: optionalText,
	EMBEDDING_MODEL: z.string().optional().default("text-embedding-3-small"),
	EMBEDDING_DIMENSIONS: optionalNumber(512),
	SEMANTIC_SIMILARITY_THRESHOLD: optionalNumber(0.5),
	SEMANTIC_TIMEOUT_MS: optionalNumber(8000),
	CEDAR_VECTOR_FILTER: optionalText,
	MASTRA_VECTOR_FILTER: optionalText,
	// Logging
	DOCS_LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.optional()
		.default("info"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function parseEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
	return EnvSchema.parse(env);
}

export const envConfig: EnvConfig = parseEnvConfig(process.env);
