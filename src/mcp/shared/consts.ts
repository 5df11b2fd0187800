export const CITATION_GUIDANCE =
	"Answer only from these results and cite them with the source and line numbers from `citations`. " +
	"If nothing relevant was found, say the topic is not covered by the docs.";

export const MASTRA_SEARCH_SUGGESTION =
	"Try searching for: agents, workflows, tools, memory, MCP, authentication, or a specific Mastra feature.";

export const SNIPPET_LENGTH = 240;
