import { describe, expect, it } from "vitest";
import { buildDocIndex } from "../../../src/domain/docs/indexer.js";
import { createKeywordSearch, DEFAULT_SCORING } from "../../../src/domain/docs/keywordSearch.js";
import { textSource, VOICE_DOC } from "../../helpers/fixtures.js";

function searchOver(text: string, scoring = DEFAULT_SCORING, maxContentLength?: number) {
	const index = buildDocIndex({ docType: "cedar", sources: [textSource("/docs/guide.md", text)] });
	return createKeywordSearch(index, scoring, { maxContentLength });
}

describe("keyword search", () => {
	it("ranks the heading hit first for a voice query", () => {
		const results = searchOver(VOICE_DOC).search("voice", 1);

		expect(results).toHaveLength(1);
		expect(results[0]).toMatchObject({
			source: "/docs/guide.md",
			heading: "Voice Setup",
			matchCount: 3,
			matchedTokens: { voice: 1 },
		});
		expect(results[0].matchedTokens.voice).toBeGreaterThanOrEqual(1);
	});

	it("orders results by non-increasing score with line citations", () => {
		const results = searchOver(VOICE_DOC).search("voice", 5);
		const start = VOICE_DOC.indexOf("The chat");

		expect(results.map(r => r.matchCount)).toEqual([3, 2]);
		expect(results[1]).toMatchObject({
			heading: "Chat",
			matchedTokens: { voice: 2 },
			citations: {
				source: "/docs/guide.md",
				approxSpan: { start, end: start + "The chat supports voice replies and voice input.".length },
				lines: { start: 5, end: 5 },
				tokenLines: { voice: [5] },
			},
		});
		// the only hit in the first chunk is its heading
		expect(results[0].citations.tokenLines).toEqual({});
	});

	it("breaks score ties by document order", () => {
		const results = searchOver(VOICE_DOC).search("voice input", 5);

		expect(results.map(r => [r.heading, r.matchCount])).toEqual([
			["Voice Setup", 3],
			["Chat", 3],
		]);
		expect(results[1].matchedTokens).toEqual({ voice: 2, input: 1 });

		const tied = searchOver("# Alpha\nA tool here.\n# Beta\nAnother tool there.").search("tool", 5);
		expect(tied.map(r => r.heading)).toEqual(["Alpha", "Beta"]);
	});

	it("applies heading boost and term bonus from the scoring config", () => {
		const flat = searchOver(VOICE_DOC, { contentWeight: 1, headingBoost: 1, termBonus: {} }).search("voice", 5);
		expect(flat.map(r => [r.heading, r.matchCount])).toEqual([
			["Chat", 2],
			["Voice Setup", 1],
		]);

		const bonus = searchOver(VOICE_DOC, { ...DEFAULT_SCORING, termBonus: { voice: 10 } }).search("voice", 5);
		expect(bonus.map(r => r.matchCount)).toEqual([13, 12]);
	});

	it("matches plural and participle forms of a query term", () => {
		const search = searchOver("# Setup\nAgents are configured here.");

		const [agent] = search.search("agent", 5);
		expect(agent.matchedTokens).toEqual({ agent: 1 });
		expect(agent.citations.tokenLines).toEqual({ agent: [2] });

		const [configure] = search.search("configure", 5);
		expect(configure.matchedTokens).toEqual({ configure: 1 });
	});

	it("returns nothing for a non-positive limit or a query without usable tokens", () => {
		const search = searchOver(VOICE_DOC);

		expect(search.search("voice", 0)).toEqual([]);
		expect(search.search("voice", -1)).toEqual([]);
		expect(search.search("a", 5)).toEqual([]);
		expect(search.search("xyzzy", 5)).toEqual([]);
	});

	it("truncates returned content", () => {
		const [result] = searchOver(VOICE_DOC, DEFAULT_SCORING, 10).search("microphone", 1);

		expect(result.content).toBe("Use the Vo");
	});

	it("returns the same ranking on repeated calls", () => {
		const search = searchOver(VOICE_DOC);

		expect(search.search("voice chat", 5)).toEqual(search.search("voice chat", 5));
	});

	it("scores query terms that share a name with Object.prototype members", () => {
		const results = searchOver("# Classes\nThe constructor runs first.").search("constructor", 5);

		expect(results).toHaveLength(1);
		expect(results[0]).toMatchObject({
			heading: "Classes",
			matchCount: 1,
			matchedTokens: { constructor: 1 },
			citations: { tokenLines: { constructor: [2] } },
		});
	});

	it("carries the section of the matched chunk", () => {
		const doc = "[EN] Source: https://mastra.ai/en/docs/agents/overview\n# Agents\nAgents call tools.";
		const [result] = searchOver(doc).search("tools", 1);

		expect(result.section).toBe("https://mastra.ai/en/docs/agents/overview");
		expect(result.url).toBeUndefined();
	});
});
