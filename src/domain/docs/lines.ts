/**
 * Offsets at which each line starts; index 0 is line 1
 */
export function computeLineStarts(text: string): number[] {
	const starts = [0];
	for (let i = 0; i < text.length; i++) {
		if (text.charCodeAt(i) === 10) {
			starts.push(i + 1);
		}
	}
	return starts;
}

/**
 * 1-based line of a character offset
 */
export function offsetToLine(lineStarts: readonly number[], offset: number): number {
	let lo = 0;
	let hi = lineStarts.length - 1;

	while (lo <= hi) {
		const mid = (lo + hi) >> 1;
		if (lineStarts[mid] <= offset) {
			lo = mid + 1;
		} else {
			hi = mid - 1;
		}
	}

	return Math.max(1, hi + 1);
}

/**
 * Unique 1-based lines inside [start, end) holding a word accepted by `matches`
 */
export function findWordLines(
	text: string,
	lineStarts: readonly number[],
	start: number,
	end: number,
	matches: (word: string) => boolean,
	maxLines = 10,
): number[] {
	const lines: number[] = [];
	const span = text.slice(start, end);

	// backslash escapes (JSON sources) separate words
	for (const match of span.matchAll(/\\(?:u[0-9a-f]{4}|.)|([a-z0-9]+)/gi)) {
		const word = match[1];
		if (word === undefined || !matches(word.toLowerCase())) continue;

		const line = offsetToLine(lineStarts, start + (match.index ?? 0));
		if (!lines.includes(line)) {
			lines.push(line);
			if (lines.length >= maxLines) break;
		}
	}

	return lines;
}
