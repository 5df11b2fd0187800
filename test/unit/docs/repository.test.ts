import { afterAll, beforeAll, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { createDocsRepository, loadDocsRepository } from "../../../src/domain/docs/repository.js";
import { createFsDocsSource, formatForPath } from "../../../src/domain/docs/sourceFs.js";
import { createTempDocs } from "../../helpers/tmpDocs.js";
import { VOICE_DOC } from "../../helpers/fixtures.js";
import { createCapturingLogger } from "../../helpers/logger.js";

let rootDir = "";
let cleanup: () => Promise<void> = async () => {};

beforeAll(async () => {
	const temp = await createTempDocs({
		"guide.md": VOICE_DOC,
		"nested/records.json": JSON.stringify([{ heading: "Install", content: "Run the CLI." }]),
		"broken.json": "{ not json",
		"notes.txt": "Plain notes about streaming.\n",
		"image.png": "not a doc",
	});
	rootDir = temp.rootDir;
	cleanup = temp.cleanup;
});

afterAll(async () => {
	await cleanup();
});

describe("fs docs source", () => {
	it("maps file extensions to formats", () => {
		expect(formatForPath("/docs/a.md")).toBe("text");
		expect(formatForPath("/docs/a.MARKDOWN")).toBe("text");
		expect(formatForPath("/docs/a.txt")).toBe("text");
		expect(formatForPath("/docs/a.json")).toBe("json");
		expect(formatForPath("/docs/a.png")).toBeNull();
	});

	it("lists matching files in sorted order", async () => {
		const files = await createFsDocsSource({ rootPath: rootDir }).listFiles();

		expect(files.map(file => path.relative(rootDir, file))).toEqual([
			"broken.json",
			"guide.md",
			"nested/records.json",
			"notes.txt",
		]);
	});

	it("honours custom patterns", async () => {
		const sources = await createFsDocsSource({ rootPath: rootDir, patterns: ["**/*.txt"] }).load();

		expect(sources).toEqual([
			{ format: "text", id: path.join(rootDir, "notes.txt"), text: "Plain notes about streaming.\n" },
		]);
	});

	it("loads a single file path", async () => {
		const sources = await createFsDocsSource({ rootPath: path.join(rootDir, "guide.md") }).load();

		expect(sources).toEqual([{ format: "text", id: path.join(rootDir, "guide.md"), text: VOICE_DOC }]);
	});

	it("returns nothing for a missing path and logs it", async () => {
		const { logger, lines } = createCapturingLogger();
		const missing = path.join(rootDir, "does-not-exist");

		expect(await createFsDocsSource({ rootPath: missing, logger }).load()).toEqual([]);
		expect(lines[0]).toMatchObject({ level: 40, msg: "docs path is not accessible", path: missing });
	});

	it("skips symlinks that resolve outside the root", async () => {
		const outside = await createTempDocs({ "secret.md": "# Secret\nHidden." });
		const linkedRoot = await createTempDocs({ "inside.md": "# Inside\nVisible." });
		try {
			await fs.symlink(path.join(outside.rootDir, "secret.md"), path.join(linkedRoot.rootDir, "linked.md"));

			const { logger, lines } = createCapturingLogger();
			const files = await createFsDocsSource({ rootPath: linkedRoot.rootDir, logger }).listFiles();
			expect(files.map(file => path.basename(file))).toEqual(["inside.md"]);
			expect(lines).toContainEqual(
				expect.objectContaining({
					level: 40,
					msg: "docs file resolves outside the docs root, skipping",
					path: path.join(linkedRoot.rootDir, "linked.md"),
				}),
			);
		} finally {
			await outside.cleanup();
			await linkedRoot.cleanup();
		}
	});

	it("keeps the files of a root reached through a symlinked directory", async () => {
		const target = await createTempDocs({ "guide.md": "# Guide\nVisible." });
		const holder = await createTempDocs({});
		try {
			const aliasRoot = path.join(holder.rootDir, "alias");
			await fs.symlink(target.rootDir, aliasRoot, "dir");

			const files = await createFsDocsSource({ rootPath: aliasRoot }).listFiles();
			expect(files).toEqual([path.join(aliasRoot, "guide.md")]);
		} finally {
			await holder.cleanup();
			await target.cleanup();
		}
	});
});

describe("docs repository", () => {
	it("indexes a docs directory and skips unparseable files", async () => {
		const { logger, lines } = createCapturingLogger();
		const repository = await loadDocsRepository({
			corpora: [{ docType: "cedar", docsPath: rootDir, includeBuiltin: false }],
			logger,
		});

		expect(repository.docTypes).toEqual(["cedar"]);
		expect(repository.describe("cedar")).toMatchObject({
			docType: "cedar",
			docsPath: rootDir,
			chunkCount: 4,
			sources: ["guide.md", "notes.txt", "records.json"],
		});

		expect(lines.find(line => line.msg === "skipping documentation source")).toMatchObject({
			level: 40,
			docType: "cedar",
			source: path.join(rootDir, "broken.json"),
		});
		expect(lines.find(line => line.msg === "documentation index built")).toMatchObject({
			level: 30,
			chunkCount: 4,
			sources: 3,
		});
	});

	it("indexes the built-in corpora when no docs path is set", async () => {
		const repository = await loadDocsRepository({
			corpora: [
				{ docType: "cedar", docsPath: null },
				{ docType: "mastra", docsPath: null },
			],
		});

		expect(repository.describe("cedar")).toMatchObject({ chunkCount: 10, sources: ["builtin:cedar"] });
		expect(repository.describe("mastra")).toMatchObject({ chunkCount: 9, sources: ["builtin:mastra"] });
	});

	it("combines built-in docs with a docs path", async () => {
		const repository = await loadDocsRepository({
			corpora: [{ docType: "cedar", docsPath: path.join(rootDir, "guide.md") }],
		});

		expect(repository.describe("cedar")).toMatchObject({
			chunkCount: 12,
			sources: ["builtin:cedar", "guide.md"],
		});
	});

	it("logs missing built-in docs and still builds the index", async () => {
		const { logger, lines } = createCapturingLogger();
		const repository = await loadDocsRepository({
			corpora: [{ docType: "mastra", docsPath: null }],
			builtinDir: path.join(rootDir, "no-builtin"),
			logger,
		});

		expect(repository.describe("mastra").chunkCount).toBe(0);
		expect(lines.find(line => line.msg === "built-in docs are missing")).toMatchObject({
			level: 50,
			docType: "mastra",
		});
	});

	it("describes a corpus that was never loaded as empty", () => {
		const repository = createDocsRepository([]);

		expect(repository.describe("mastra")).toMatchObject({ docType: "mastra", chunkCount: 0, sources: [] });
	});
});
