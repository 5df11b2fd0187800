#!/usr/bin/env node

import { main } from "./index.js";

main().catch(error => {
	// eslint-disable-next-line no-console
	console.error("[docs-retrieval-mcp] CLI error:", error);
	process.exit(1);
});
