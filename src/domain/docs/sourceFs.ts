import { globby } from "globby";
import { readFile, realpath, stat } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { isWithinRoot } from "../../config/security.js";
import type { Logger } from "../../logger/logger.js";
import { errorMessage } from "../errors.js";
import type { DocSource, DocSourceFormat } from "./types.js";

export const DEFAULT_DOCS_PATTERNS = ["**/*.md", "**/*.markdown", "**/*.txt", "**/*.json"];

const SUPPORTED_EXTENSIONS = new Set([".md", ".markdown", ".txt", ".json"]);

/**
 * Configuration for file system docs source
 */
export interface DocsSourceConfig {
	rootPath: string; // a directory to scan or a single file
	patterns?: string[];
	logger?: Logger;
}

/**
 * Interface for docs source (can be FS, HTTP, etc.)
 */
export interface DocsSource {
	listFiles(): Promise<string[]>;
	load(): Promise<DocSource[]>;
}

export function formatForPath(filePath: string): DocSourceFormat | null {
	const extension = extname(filePath).toLowerCase();
	if (!SUPPORTED_EXTENSIONS.has(extension)) return null;
	return extension === ".json" ? "json" : "text";
}

/**
 * Create a file system-based docs source.
 * Unreadable files and files resolving outside the root are logged and skipped.
 */
export function createFsDocsSource(config: DocsSourceConfig): DocsSource {
	const rootPath = resolve(config.rootPath);
	const patterns = config.patterns?.length ? config.patterns : DEFAULT_DOCS_PATTERNS;
	const log = config.logger;

	async function listFiles(): Promise<string[]> {
		let realRoot: string;
		let isDirectory: boolean;
		try {
			realRoot = await realpath(rootPath);
			isDirectory = (await stat(realRoot)).isDirectory();
		} catch (error) {
			log?.warn({ path: rootPath, err: errorMessage(error) }, "docs path is not accessible");
			return [];
		}

		if (!isDirectory) {
			return [rootPath];
		}

		const files = await globby(patterns, {
			cwd: rootPath,
			absolute: true,
			onlyFiles: true,
		});

		const inside: string[] = [];
		for (const file of files) {
			let realFile: string;
			try {
				realFile = await realpath(file);
			} catch (error) {
				log?.warn({ path: file, err: errorMessage(error) }, "skipping unresolvable docs file");
				continue;
			}

			if (isWithinRoot(realFile, realRoot)) {
				inside.push(file);
			} else {
				log?.warn({ path: file, resolvesTo: realFile }, "docs file resolves outside the docs root, skipping");
			}
		}

		return inside.sort();
	}

	return {
		listFiles,

		async load(): Promise<DocSource[]> {
			const sources: DocSource[] = [];

			for (const filePath of await listFiles()) {
				const format = formatForPath(filePath);
				if (!format) {
					log?.warn({ path: filePath }, "unsupported docs file type, skipping");
					continue;
				}

				try {
					const text = await readFile(filePath, "utf-8");
					sources.push({ format, id: filePath, text });
				} catch (error) {
					log?.warn({ path: filePath, err: errorMessage(error) }, "skipping unreadable docs file");
				}
			}

			return sources;
		},
	};
}
