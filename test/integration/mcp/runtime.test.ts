import { describe, expect, it } from "vitest";
import { parseEnvConfig } from "../../../src/config/envConfig.js";
import { resolveDocsSettings } from "../../../src/config/settings.js";
import { createSilentLogger } from "../../../src/logger/logger.js";
import { createDocsRuntime } from "../../../src/server.js";

describe("docs runtime", () => {
	it("starts keyword-only on the built-in corpora with an empty environment", async () => {
		const docsService = await createDocsRuntime(resolveDocsSettings(parseEnvConfig({})), createSilentLogger());

		expect(docsService.semanticAvailable).toBe(false);
		expect(docsService.describeAll().map(summary => [summary.docType, summary.chunkCount])).toEqual([
			["cedar", 10],
			["mastra", 9],
		]);

		const response = await docsService.search({ query: "voice", limit: 2 });
		expect(response.docType).toBe("cedar");
		expect(response.results.map(result => result.heading)).toEqual(["Voice Configuration", "Voice Setup"]);
	});

	it("enables semantic search when credentials are configured", async () => {
		const settings = resolveDocsSettings(
			parseEnvConfig({
				SUPABASE_URL: "https://db.example.test",
				SUPABASE_KEY: "test-secret",
				OPENAI_API_KEY: "test-key",
			}),
		);
		const docsService = await createDocsRuntime(settings, createSilentLogger());

		expect(docsService.semanticAvailable).toBe(true);
	});
});
