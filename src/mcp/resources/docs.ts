import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DocType, DocsService } from "../../domain/index.js";
import { URIS } from "../uris.js";

const TITLES: Record<DocType, string> = {
	cedar: "Cedar documentation index",
	mastra: "Mastra documentation index",
};

const DESCRIPTIONS: Record<DocType, string> = {
	cedar: "Indexed Cedar documentation: docs path, chunk count and source files.",
	mastra: "Indexed Mastra backend documentation: docs path, chunk count, source files and docs sections.",
};

/**
 * Register docs://{docType} - index summary for one corpus
 */
export function registerDocsIndexResource(
	server: McpServer,
	docsService: DocsService,
	docType: DocType,
): void {
	server.registerResource(
		`${docType}-docs`,
		URIS.docsIndex(docType),
		{
			title: TITLES[docType],
			description: DESCRIPTIONS[docType],
			mimeType: "application/json",
		},
		async uri => {
			const summary = docsService.describe(docType);

			return {
				contents: [
					{
						uri: uri.href,
						mimeType: "application/json",
						text: JSON.stringify(
							{
								...summary,
								builtAt: new Date(summary.builtAt).toISOString(),
								semanticSearch: docsService.semanticAvailable,
							},
							null,
							2,
						),
					},
				],
			};
		},
	);
}
