import type { DocType } from "../domain/index.js";

/**
 * Centralized MCP resource URIs
 */
export const URIS = {
	docsIndex: (docType: DocType): string => `docs://${docType}`,
} as const;
