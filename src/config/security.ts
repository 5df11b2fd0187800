import path from "node:path";
import { fileURLToPath } from "node:url";
import isPathInside from "is-path-inside";

/**
 * Docs paths may arrive as file:// URIs from MCP client configs
 */
export function uriToFsPath(uriOrPath: string): string {
	return path.resolve(uriOrPath.startsWith("file://") ? fileURLToPath(uriOrPath) : uriOrPath);
}

/**
 * Both paths must already be resolved through symlinks
 */
export function isWithinRoot(realPath: string, realRoot: string): boolean {
	return realPath === realRoot || isPathInside(realPath, realRoot);
}
