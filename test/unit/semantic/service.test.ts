import { describe, expect, it, vi } from "vitest";
import { SemanticSearchError } from "../../../src/domain/errors.js";
import { withDeadline } from "../../../src/domain/semantic/deadline.js";
import { createSemanticSearch, toSemanticResult } from "../../../src/domain/semantic/service.js";
import type { EmbeddingProvider, VectorMatch, VectorStore } from "../../../src/domain/semantic/types.js";

const embedder: EmbeddingProvider = {
	name: "stub",
	dimensions: 3,
	embed: async () => [0.1, 0.2, 0.3],
};

function storeReturning(matches: VectorMatch[]) {
	const match = vi.fn<VectorStore["match"]>(async () => matches);
	const store: VectorStore = { name: "memory", match };
	return { store, match };
}

describe("toSemanticResult", () => {
	it("maps metadata fields onto the result", () => {
		expect(
			toSemanticResult(
				{
					id: "7",
					content: " Agents call tools. ",
					metadata: { source_label: "Mastra docs", url: "https://example.com/agents", section_title: "Agents" },
					similarity: 0.8,
				},
				2000,
			),
		).toEqual({
			id: "7",
			source: "Mastra docs",
			heading: "Agents",
			content: "Agents call tools.",
			url: "https://example.com/agents",
			similarity: 0.8,
			metadata: { source_label: "Mastra docs", url: "https://example.com/agents", section_title: "Agents" },
		});
	});

	it("falls back to metadata text, the url and the header trail", () => {
		expect(
			toSemanticResult(
				{
					content: null,
					metadata: { text: "From metadata.", url: "https://example.com/x", headers: ["Guide", "Voice", 3] },
					similarity: 0.6,
				},
				4,
			),
		).toMatchObject({ source: "https://example.com/x", heading: "Guide > Voice", content: "From" });
	});

	it("drops matches without content", () => {
		expect(toSemanticResult({ content: "  ", metadata: {}, similarity: 0.9 }, 2000)).toBeNull();
		expect(toSemanticResult({ content: null, metadata: {}, similarity: 0.9 }, 2000)).toBeNull();
	});
});

describe("semantic search", () => {
	it("embeds the query, filters by threshold and sorts by similarity", async () => {
		const { store, match } = storeReturning([
			{ id: "low", content: "Below threshold.", metadata: {}, similarity: 0.4 },
			{ id: "b", content: null, metadata: { text: "Second best." }, similarity: 0.7 },
			{ id: "a", content: "Best match.", metadata: {}, similarity: 0.9 },
			{ id: "empty", content: "", metadata: {}, similarity: 0.8 },
		]);
		const semantic = createSemanticSearch({ embedder, store, threshold: 0.5 });

		const results = await semantic.search("voice", { limit: 5, filter: "cedar-docs" });

		expect(results.map(r => [r.id, r.content, r.source])).toEqual([
			["a", "Best match.", "vector-store"],
			["b", "Second best.", "vector-store"],
		]);
		expect(match).toHaveBeenCalledWith(
			expect.objectContaining({ embedding: [0.1, 0.2, 0.3], threshold: 0.5, count: 5, filter: "cedar-docs" }),
		);
		expect(semantic.description).toBe("stub embeddings (3d) + memory");
	});

	it("limits the number of results", async () => {
		const { store } = storeReturning([
			{ content: "One.", metadata: {}, similarity: 0.9 },
			{ content: "Two.", metadata: {}, similarity: 0.8 },
		]);
		const semantic = createSemanticSearch({ embedder, store });

		expect((await semantic.search("q", { limit: 1 })).map(r => r.content)).toEqual(["One."]);
	});

	it("propagates adapter failures", async () => {
		const semantic = createSemanticSearch({
			embedder: {
				...embedder,
				embed: async () => {
					throw new SemanticSearchError("EMBEDDING_FAILED", "Embedding request failed: offline");
				},
			},
			store: storeReturning([]).store,
		});

		await expect(semantic.search("q", { limit: 5 })).rejects.toMatchObject({
			code: "EMBEDDING_FAILED",
			message: "Embedding request failed: offline",
		});
	});

	it("times out a hanging provider", async () => {
		const semantic = createSemanticSearch({
			embedder: { ...embedder, embed: () => new Promise<number[]>(() => {}) },
			store: storeReturning([]).store,
			timeoutMs: 10,
		});

		await expect(semantic.search("q", { limit: 5 })).rejects.toMatchObject({ code: "TIMEOUT" });
	});
});

describe("withDeadline", () => {
	it("resolves with the task result and hands it an abort signal", async () => {
		const result = await withDeadline(async signal => (signal.aborted ? "aborted" : "done"), { timeoutMs: 100 });

		expect(result).toBe("done");
	});

	it("aborts the task signal on timeout", async () => {
		const seen: AbortSignal[] = [];
		const pending = withDeadline(
			signal => {
				seen.push(signal);
				return new Promise<string>(() => {});
			},
			{ timeoutMs: 10, context: "Lookup" },
		);

		await expect(pending).rejects.toThrow("Lookup timed out after 10ms");
		expect(seen[0].aborted).toBe(true);
	});

	it("rejects when the caller aborts mid-flight", async () => {
		const controller = new AbortController();
		const pending = withDeadline(() => new Promise<string>(() => {}), {
			timeoutMs: 1000,
			signal: controller.signal,
		});
		controller.abort();

		await expect(pending).rejects.toMatchObject({ code: "ABORTED" });
	});

	it("rejects an invalid timeout", async () => {
		await expect(withDeadline(async () => 1, { timeoutMs: 0 })).rejects.toThrow("Invalid timeout value: 0");
	});
});
