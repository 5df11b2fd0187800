import { z } from "zod";
import { DocsSourceError, errorMessage } from "../errors.js";
import { offsetToLine } from "./lines.js";
import { normalizeWhitespace } from "./tokenizer.js";
import type { ChunkingOptions, DocSource, DocumentChunk } from "./types.js";

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
	maxChunkSize: 2000,
};

const HEADING_RE = /^(#{1,6})\s+(.+?)\s*$/;
const URL_MARKER_RE = /^Source:\s+(https?:\/\/\S+)\s*$/;
const SECTION_MARKER_RE = /^\[[A-Za-z-]+\]\s+Source:\s+(https?:\/\/\S+)\s*$/;
const FENCE_RE = /^\s*(```|~~~)/;
const PARAGRAPH_BREAK_RE = /\n[ \t\r]*\n/g;

const JsonRecordSchema = z.object({
	heading: z.string().nullish(),
	content: z.string().nullish(),
	url: z.string().nullish(),
	section: z.string().nullish(),
});

const JsonRecordsSchema = z.array(JsonRecordSchema);

type Span = [start: number, end: number];

interface TextBlock {
	heading: string;
	url?: string;
	section?: string;
	start: number;
	end: number;
}

function isSpace(char: string | undefined): boolean {
	return char !== undefined && /\s/.test(char);
}

function trimSpan(text: string, start: number, end: number): Span {
	let s = start;
	let e = end;
	while (s < e && isSpace(text[s])) s++;
	while (e > s && isSpace(text[e - 1])) e--;
	return [s, e];
}

function normalizedLength(text: string, [start, end]: Span): number {
	return normalizeWhitespace(text.slice(start, end)).length;
}

function effectiveSize(maxSize: number): number {
	return maxSize >= 1 ? Math.floor(maxSize) : 1;
}

/**
 * Cut a span that has no paragraph breaks at the last whitespace under the limit.
 * Raw length bounds normalized length, so every window of maxSize raw chars fits.
 */
function hardSplit(text: string, span: Span, maxSize: number): Span[] {
	const pieces: Span[] = [];
	let [start, end] = span;

	while (start < end && normalizedLength(text, [start, end]) > maxSize) {
		const window = text.slice(start, start + maxSize);
		const lastSpace = window.search(/\s\S*$/);
		const cut = lastSpace > 0 ? start + lastSpace : start + maxSize;

		const piece = trimSpan(text, start, cut);
		if (piece[0] < piece[1]) pieces.push(piece);
		[start, end] = trimSpan(text, cut, end);
	}

	if (start < end) pieces.push([start, end]);
	return pieces;
}

/**
 * Split an oversized block on blank lines, packing paragraphs up to maxSize.
 * Sizes below one character count as one.
 */
export function splitSpan(text: string, span: Span, requestedSize: number): Span[] {
	const maxSize = effectiveSize(requestedSize);
	if (normalizedLength(text, span) <= maxSize) {
		return [span];
	}

	const [blockStart, blockEnd] = span;
	const paragraphs: Span[] = [];
	let cursor = blockStart;

	for (const match of text.slice(blockStart, blockEnd).matchAll(PARAGRAPH_BREAK_RE)) {
		const breakAt = blockStart + (match.index ?? 0);
		const paragraph = trimSpan(text, cursor, breakAt);
		if (paragraph[0] < paragraph[1]) paragraphs.push(...hardSplit(text, paragraph, maxSize));
		cursor = breakAt + match[0].length;
	}
	const last = trimSpan(text, cursor, blockEnd);
	if (last[0] < last[1]) paragraphs.push(...hardSplit(text, last, maxSize));

	const packed: Span[] = [];
	let current: Span | null = null;

	for (const paragraph of paragraphs) {
		if (current === null) {
			current = paragraph;
			continue;
		}
		const merged: Span = [current[0], paragraph[1]];
		if (normalizedLength(text, merged) <= maxSize) {
			current = merged;
		} else {
			packed.push(current);
			current = paragraph;
		}
	}
	if (current !== null) packed.push(current);

	return packed;
}

function makeChunk(
	sourceId: string,
	text: string,
	lineStarts: readonly number[],
	[start, end]: Span,
	heading: string,
	url: string | undefined,
	section: string | undefined,
	content = normalizeWhitespace(text.slice(start, end)),
): DocumentChunk {
	return Object.freeze({
		source: sourceId,
		heading,
		content,
		startOffset: start,
		endOffset: end,
		startLine: offsetToLine(lineStarts, start),
		endLine: offsetToLine(lineStarts, end - 1),
		...(url ? { url } : {}),
		...(section ? { section } : {}),
	});
}

/**
 * Heading-delimited blocks of a markdown-like document.
 * `Source: <url>` lines close the current block and set the url of the blocks after them;
 * `[EN] Source: <url>` lines do the same for their section.
 */
export function splitTextBlocks(text: string): TextBlock[] {
	const blocks: TextBlock[] = [];
	let heading = "";
	let url: string | undefined;
	let section: string | undefined;
	let bodyStart = 0;
	let inFence = false;
	let offset = 0;

	const close = (end: number): void => {
		const [start, trimmedEnd] = trimSpan(text, bodyStart, end);
		if (start < trimmedEnd) {
			blocks.push({ heading, url, section, start, end: trimmedEnd });
		}
	};

	for (const line of text.split("\n")) {
		const lineStart = offset;
		const lineEnd = lineStart + line.length;
		offset = lineEnd + 1;

		if (FENCE_RE.test(line)) {
			inFence = !inFence;
			continue;
		}
		if (inFence) continue;

		const headingMatch = line.match(HEADING_RE);
		if (headingMatch) {
			close(lineStart);
			heading = headingMatch[2].replace(/\s+#+$/, "").trim();
			bodyStart = Math.min(offset, text.length);
			continue;
		}

		const urlMatch = line.match(URL_MARKER_RE);
		const sectionMatch = urlMatch ? null : line.match(SECTION_MARKER_RE);
		if (urlMatch) {
			close(lineStart);
			url = urlMatch[1];
			bodyStart = Math.min(offset, text.length);
		} else if (sectionMatch) {
			close(lineStart);
			section = sectionMatch[1];
			bodyStart = Math.min(offset, text.length);
		}
	}

	close(text.length);
	return blocks;
}

function chunkText(
	source: Extract<DocSource, { format: "text" }>,
	lineStarts: readonly number[],
	options: ChunkingOptions,
): DocumentChunk[] {
	const chunks: DocumentChunk[] = [];

	for (const block of splitTextBlocks(source.text)) {
		for (const span of splitSpan(source.text, [block.start, block.end], options.maxChunkSize)) {
			chunks.push(
				makeChunk(source.id, source.text, lineStarts, span, block.heading, block.url, block.section),
			);
		}
	}

	return chunks;
}

/**
 * Locate a record's content value in the raw JSON text, after the previous record.
 * Only the value of a `"content":` key counts, so equal headings or key names never match.
 */
function locateRecord(text: string, content: string, cursor: number): Span {
	const encoded = JSON.stringify(content);
	const contentKey = /"content"\s*:\s*/g;
	contentKey.lastIndex = cursor;

	for (let match = contentKey.exec(text); match !== null; match = contentKey.exec(text)) {
		if (match.index > 0 && text[match.index - 1] === "\\") continue;
		const valueStart = match.index + match[0].length;
		if (text.startsWith(encoded, valueStart)) {
			return [valueStart + 1, valueStart + encoded.length - 1];
		}
	}

	const brace = text.indexOf("{", cursor);
	const start = brace >= 0 ? brace : Math.max(0, Math.min(cursor, text.length - 1));
	return [start, start + 1];
}

function chunkJsonRecords(
	source: Extract<DocSource, { format: "json" }>,
	lineStarts: readonly number[],
): DocumentChunk[] {
	let data: unknown;
	try {
		data = JSON.parse(source.text);
	} catch (error) {
		throw new DocsSourceError(source.id, "SOURCE_PARSE_FAILED", `invalid JSON: ${errorMessage(error)}`, error);
	}

	const parsed = JsonRecordsSchema.safeParse(data);
	if (!parsed.success) {
		throw new DocsSourceError(
			source.id,
			"SOURCE_PARSE_FAILED",
			`expected an array of { heading?, content } records: ${parsed.error.issues[0]?.message ?? "invalid shape"}`,
			parsed.error,
		);
	}

	const chunks: DocumentChunk[] = [];
	let cursor = 0;

	for (const record of parsed.data) {
		const raw = record.content ?? "";
		const content = normalizeWhitespace(raw);
		if (!content) continue;

		const span = locateRecord(source.text, raw, cursor);
		cursor = span[1];
		chunks.push(
			makeChunk(
				source.id,
				source.text,
				lineStarts,
				span,
				record.heading?.trim() ?? "",
				record.url ?? undefined,
				record.section ?? undefined,
				content,
			),
		);
	}

	return chunks;
}

/**
 * Turn one source into ordered, non-overlapping chunks
 */
export function chunkSource(
	source: DocSource,
	lineStarts: readonly number[],
	options: ChunkingOptions = DEFAULT_CHUNKING_OPTIONS,
): DocumentChunk[] {
	switch (source.format) {
		case "text":
			return chunkText(source, lineStarts, options);
		case "json":
			return chunkJsonRecords(source, lineStarts);
	}
}
