import type { TokenizerOptions } from "./types.js";

/**
 * Short tokens that still carry meaning in technical docs
 */
export const DEFAULT_SHORT_TOKENS: ReadonlySet<string> = new Set([
	"ai",
	"ui",
	"ux",
	"os",
	"llm",
	"sse",
	"mcp",
	"api",
	"jwt",
	"cli",
	"sdk",
]);

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
	"and",
	"are",
	"but",
	"can",
	"does",
	"for",
	"from",
	"has",
	"have",
	"how",
	"into",
	"not",
	"the",
	"that",
	"this",
	"what",
	"when",
	"where",
	"which",
	"with",
	"you",
	"your",
]);

export const DEFAULT_TOKENIZER_OPTIONS: TokenizerOptions = {
	minTokenLength: 3,
	shortTokens: DEFAULT_SHORT_TOKENS,
	stopWords: DEFAULT_STOP_WORDS,
};

export function normalizeWhitespace(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}

function isKept(token: string, options: TokenizerOptions): boolean {
	if (options.stopWords.has(token)) return false;
	return token.length >= options.minTokenLength || options.shortTokens.has(token);
}

/**
 * Lower-case and split on non-alphanumeric runs, keeping duplicates in order
 */
export function tokenize(
	text: string,
	options: TokenizerOptions = DEFAULT_TOKENIZER_OPTIONS,
): string[] {
	return text
		.toLowerCase()
		.split(/[^a-z0-9]+/)
		.filter(token => token.length > 0 && isKept(token, options));
}

/**
 * Unique query tokens, first occurrence order
 */
export function queryTokens(
	query: string,
	options: TokenizerOptions = DEFAULT_TOKENIZER_OPTIONS,
): string[] {
	return Array.from(new Set(tokenize(query, options)));
}

/**
 * Token plus plural/participle stems, e.g. "agents" → ["agents", "agent"].
 * Every variant an indexed token produces is a key a query token can hit.
 */
export function suffixVariants(
	token: string,
	options: TokenizerOptions = DEFAULT_TOKENIZER_OPTIONS,
): string[] {
	const variants = new Set<string>([token]);
	const add = (stem: string): void => {
		if (stem !== token && isKept(stem, options)) variants.add(stem);
	};

	if (token.endsWith("ies") && token.length > 4) {
		add(`${token.slice(0, -3)}y`);
	} else if (token.endsWith("es") && token.length > 4) {
		add(token.slice(0, -2));
		add(token.slice(0, -1));
	} else if (token.endsWith("s") && !token.endsWith("ss") && token.length > 3) {
		add(token.slice(0, -1));
	}

	if (token.endsWith("ing") && token.length > 5) {
		const stem = token.slice(0, -3);
		add(stem);
		add(`${stem}e`);
	}

	if (token.endsWith("ed") && token.length > 4) {
		add(token.slice(0, -2));
		add(token.slice(0, -1));
	}

	return Array.from(variants);
}

/**
 * Occurrence counts of every token and its variants
 */
export function countTokens(
	text: string,
	options: TokenizerOptions = DEFAULT_TOKENIZER_OPTIONS,
): Map<string, number> {
	const counts = new Map<string, number>();
	for (const token of tokenize(text, options)) {
		for (const key of suffixVariants(token, options)) {
			counts.set(key, (counts.get(key) ?? 0) + 1);
		}
	}
	return counts;
}
