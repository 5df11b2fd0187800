import { pathToFileURL } from "node:url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { envConfig } from "./config/envConfig.js";
import { resolveDocsSettings } from "./config/settings.js";
import { createLogger } from "./logger/logger.js";
import { buildDocsServer, createDocsRuntime } from "./server.js";

// Re-export for programmatic usage
export { buildDocsServer, createDocsRuntime } from "./server.js";
export * from "./domain/index.js";

/**
 * Main entry point: builds the indexes and the MCP server, then connects it to stdio.
 * Can be called from CLI or imported programmatically.
 */
export async function main(): Promise<void> {
	const settings = resolveDocsSettings(envConfig);
	const logger = createLogger({ level: settings.logLevel });

	const docsService = await createDocsRuntime(settings, logger);
	const server = buildDocsServer(docsService);

	const transport = new StdioServerTransport();
	await server.connect(transport);
	logger.info("MCP server listening on stdio");
}

// Auto-start when run directly (not imported)
const isMainModule = process.argv[1] !== undefined && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMainModule) {
	main().catch(error => {
		// eslint-disable-next-line no-console
		console.error("[docs-retrieval-mcp] Fatal error:", error);
		process.exit(1);
	});
}
