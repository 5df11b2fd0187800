import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DOC_TYPES, type DocsService } from "../../domain/index.js";
import { registerDocsIndexResource } from "../../mcp/resources/docs.js";
import { registerSearchDocsTool, registerSearchMastraDocsTool } from "../../mcp/tools/docs.js";

/**
 * Registers all documentation features (index resources and search tools).
 */
export function registerDocsFeatures(server: McpServer, docsService: DocsService): void {
	// Resources
	for (const docType of DOC_TYPES) {
		registerDocsIndexResource(server, docsService, docType);
	}

	// Tools
	registerSearchDocsTool(server, docsService);
	registerSearchMastraDocsTool(server, docsService);
}
