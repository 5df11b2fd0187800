import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { DocSource, DocType } from "./types.js";

/** Shipped with the package; resolves the same from src/ and dist/ */
export const BUILTIN_DOCS_DIR = fileURLToPath(new URL("../../../docs/builtin/", import.meta.url));

export function builtinSourceId(docType: DocType): string {
	return `builtin:${docType}`;
}

export async function loadBuiltinSource(
	docType: DocType,
	dir: string = BUILTIN_DOCS_DIR,
): Promise<DocSource> {
	const text = await readFile(join(dir, `${docType}.md`), "utf-8");
	return { format: "text", id: builtinSourceId(docType), text };
}
