/**
 * Error types raised inside the docs domain.
 * None of them escape to MCP callers: source errors are logged by the indexer,
 * semantic errors are turned into a keyword fallback by the retriever.
 */

export type DocsErrorCode =
	| "SOURCE_PARSE_FAILED"
	| "EMBEDDING_FAILED"
	| "VECTOR_STORE_FAILED"
	| "MALFORMED_RESPONSE"
	| "TIMEOUT"
	| "ABORTED";

export interface DocsErrorOptions {
	message: string;
	code: DocsErrorCode;
	details?: Record<string, unknown>;
	cause?: unknown;
}

export class DocsError extends Error {
	public readonly code: DocsErrorCode;
	public readonly details?: Record<string, unknown>;

	constructor({ message, code, details, cause }: DocsErrorOptions) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = this.constructor.name;
		this.code = code;
		this.details = details;

		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/**
 * A documentation source could not be parsed
 */
export class DocsSourceError extends DocsError {
	public readonly sourceId: string;

	constructor(
		sourceId: string,
		code: "SOURCE_PARSE_FAILED",
		message: string,
		cause?: unknown,
	) {
		super({ message: `${sourceId}: ${message}`, code, details: { sourceId }, cause });
		this.sourceId = sourceId;
	}
}

/**
 * Embedding provider or vector store failure during a semantic search
 */
export class SemanticSearchError extends DocsError {
	constructor(
		code: "EMBEDDING_FAILED" | "VECTOR_STORE_FAILED" | "MALFORMED_RESPONSE" | "TIMEOUT" | "ABORTED",
		message: string,
		details?: Record<string, unknown>,
		cause?: unknown,
	) {
		super({ message, code, details, cause });
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
