import type { Chunk, ChunkingOptions } from '../domain/model/Chunk.js';

/** Split points in preference order: paragraph, sentence, word. */
const BOUNDARY_PATTERNS: readonly RegExp[] = [
    /\n[ \t]*\n\s*/g,
    /[.!?…;]+["'»)\]]*\s+/g,
    /\s+/g
];

/**
 * Splits extracted text into overlapping passages.
 *
 * Each chunk is packed greedily up to `maxSize` characters and ends on the
 * coarsest boundary found in the upper half of the window, falling back to a
 * hard cut when the window has no whitespace at all. Consecutive chunks share
 * exactly `overlap` characters. The output depends only on the text and the
 * options, so ordinals stay stable between runs.
 */
export class Chunker {
    private readonly maxSize: number;
    private readonly overlap: number;

    constructor(options: ChunkingOptions) {
        if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
            throw new RangeError(`maxSize must be a positive integer, got ${options.maxSize}`);
        }
        if (!Number.isInteger(options.overlap) || options.overlap < 0 || options.overlap >= options.maxSize) {
            throw new RangeError(`overlap must be in [0, ${options.maxSize}), got ${options.overlap}`);
        }
        this.maxSize = options.maxSize;
        this.overlap = options.overlap;
    }

    chunk(fileIdentity: string, text: string): Chunk[] {
        const chunks: Chunk[] = [];
        const bytes = new ByteOffsetCursor(text);

        for (const [start, end] of this.spans(text)) {
            const span = text.slice(start, end);
            if (span.trim().length === 0) {
                continue;
            }
            chunks.push({
                fileIdentity,
                ordinal: chunks.length,
                text: span,
                startOffset: bytes.at(start),
                endOffset: bytes.at(end)
            });
        }

        return chunks;
    }

    /** Character spans [start, end) covering the text. */
    spans(text: string): Array<[number, number]> {
        const spans: Array<[number, number]> = [];
        if (text.length === 0) {
            return spans;
        }

        const levels = BOUNDARY_PATTERNS.map(pattern => collectBoundaries(text, pattern));
        const minFill = Math.floor(this.maxSize / 2);

        let start = 0;
        for (;;) {
            const end = this.findEnd(text, start, levels, minFill);
            spans.push([start, end]);

            if (end >= text.length) {
                return spans;
            }
            start = end - this.overlap > start ? end - this.overlap : end;
        }
    }

    private findEnd(text: string, start: number, levels: number[][], minFill: number): number {
        const limit = start + this.maxSize;
        if (limit >= text.length) {
            return text.length;
        }

        for (const boundaries of levels) {
            const candidate = lastBoundaryIn(boundaries, start + minFill, limit);
            if (candidate !== null) {
                return candidate;
            }
        }

        // Hard cut; keep surrogate pairs together
        const code = text.charCodeAt(limit - 1);
        return code >= 0xd800 && code <= 0xdbff && limit - 1 > start ? limit - 1 : limit;
    }
}

function collectBoundaries(text: string, pattern: RegExp): number[] {
    const boundaries: number[] = [];
    const regex = new RegExp(pattern.source, pattern.flags);
    for (const match of text.matchAll(regex)) {
        boundaries.push((match.index ?? 0) + match[0].length);
    }
    return boundaries;
}

/** Largest boundary b with low < b <= high, or null. */
function lastBoundaryIn(boundaries: number[], low: number, high: number): number | null {
    let lo = 0;
    let hi = boundaries.length - 1;
    let found = -1;

    while (lo <= hi) {
        const mid = (lo + hi) >> 1;
        const value = boundaries[mid] ?? Number.POSITIVE_INFINITY;
        if (value <= high) {
            found = mid;
            lo = mid + 1;
        } else {
            hi = mid - 1;
        }
    }

    const boundary = found >= 0 ? boundaries[found] : undefined;
    return boundary !== undefined && boundary > low ? boundary : null;
}

/**
 * Converts character positions to UTF-8 byte offsets. Positions are visited
 * mostly in increasing order, so the cursor only measures the distance moved.
 */
class ByteOffsetCursor {
    private charPos = 0;
    private bytePos = 0;

    constructor(private readonly text: string) {}

    at(charIndex: number): number {
        if (charIndex >= this.charPos) {
            this.bytePos += Buffer.byteLength(this.text.slice(this.charPos, charIndex), 'utf-8');
        } else {
            this.bytePos -= Buffer.byteLength(this.text.slice(charIndex, this.charPos), 'utf-8');
        }
        this.charPos = charIndex;
        return this.bytePos;
    }
}
