import type { SplitConfig, SplitMode } from '../types/delivery.js';
import { SPLIT_MODES } from '../types/delivery.js';
import { ConfigError, SplitError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';

/** One piece of a split response plus the whitespace consumed after it. */
export interface SplitSegment {
    text: string;
    separator: string;
}

export interface SplitResult {
    segments: SplitSegment[];
    requestedMode: SplitMode;
    appliedMode: SplitMode;
    /** Present when the requested mode was not applied as-is. */
    fallback?: SplitError;
}

type BoundaryKind = 'paragraph' | 'line' | 'sentence' | 'word';

interface Boundary {
    start: number;
    end: number;
    kind: BoundaryKind;
}

interface Range {
    start: number;
    end: number;
}

export const DEFAULT_SPLIT_CONFIG: SplitConfig = {
    mode: 'simple_improved',
    maxChunkLength: 800,
    minChunkLength: 200,
};

const WHITESPACE_RUN = /\s+/g;
const PARAGRAPH_BREAK = /\n[^\S\n]*\n/;
const SENTENCE_END = /[.!?…]["'”’)\]]*$/;
/** Unclosed fences run to the end of the text. */
const CODE_FENCE_PATTERN = /```[\s\S]*?(?:```|$)/g;
const INLINE_SPAN_PATTERNS: readonly RegExp[] = [
    /`[^`\n]+`/g,
    /\*\*[^\n]+?\*\*/g,
    /__[^\n]+?__/g,
    /~~[^\n]+?~~/g,
    /\*[^*\s][^*\n]*?\*/g,
    /\b_[^_\n]+_\b/g,
    /\[[^\]\n]+\]\([^)\s]+\)/g,
];

/** Validate thresholds; a bad config is rejected, never clamped. */
export function validateSplitConfig(config: SplitConfig): SplitConfig {
    if (!SPLIT_MODES.includes(config.mode)) {
        throw new ConfigError('invalid_split_mode', 'mode', `Unknown split mode '${String(config.mode)}'.`);
    }
    if (!Number.isInteger(config.maxChunkLength) || config.maxChunkLength < 1) {
        throw new ConfigError(
            'invalid_chunk_length',
            'maxChunkLength',
            `maxChunkLength must be a positive integer (got ${config.maxChunkLength}).`,
        );
    }
    if (!Number.isInteger(config.minChunkLength) || config.minChunkLength < 0) {
        throw new ConfigError(
            'invalid_chunk_length',
            'minChunkLength',
            `minChunkLength must be a non-negative integer (got ${config.minChunkLength}).`,
        );
    }
    if (config.minChunkLength > config.maxChunkLength) {
        throw new ConfigError(
            'chunk_length_order',
            'minChunkLength',
            `minChunkLength (${config.minChunkLength}) exceeds maxChunkLength (${config.maxChunkLength}).`,
        );
    }
    return config;
}

/**
 * Splits a generated response into the messages that will be sent one by one.
 *
 * Cuts only happen on whitespace, and the whitespace of each cut is kept as the
 * segment's `separator`, so joining `text + separator` of every segment gives
 * back the input unchanged.
 */
export class ResponseSplitter {
    readonly #config: SplitConfig;

    constructor(config: SplitConfig) {
        this.#config = validateSplitConfig({ ...config });
    }

    get config(): SplitConfig {
        return { ...this.#config };
    }

    split(text: string, mode: SplitMode = this.#config.mode): SplitResult {
        switch (mode) {
            case 'none':
                return { segments: [whole(text)], requestedMode: mode, appliedMode: 'none' };
            case 'simple':
                return { segments: this.#splitSimple(text, null), requestedMode: mode, appliedMode: 'simple' };
            case 'simple_improved':
                return { segments: this.#splitImproved(text), requestedMode: mode, appliedMode: 'simple_improved' };
            case 'markdown':
            case 'structured':
                return this.#fallback(text, mode);
            default: {
                const unreachable: never = mode;
                throw new ConfigError('invalid_split_mode', 'mode', `Unknown split mode '${String(unreachable)}'.`);
            }
        }
    }

    /** Chunk texts only, in order. */
    splitTexts(text: string, mode: SplitMode = this.#config.mode): string[] {
        return this.split(text, mode).segments.map((segment) => segment.text);
    }

    #fallback(text: string, mode: SplitMode): SplitResult {
        const fallback = new SplitError(mode, 'none', `Split mode '${mode}' has no splitting policy yet; sending whole text.`);
        void logThought(`[ResponseSplitter] ${fallback.message}`);
        return { segments: [whole(text)], requestedMode: mode, appliedMode: 'none', fallback };
    }

    #splitImproved(text: string): SplitSegment[] {
        const segments = this.#splitSimple(text, findProtectedRanges(text));
        if (segments.length < 2) return segments;

        const last = segments[segments.length - 1];
        const previous = segments[segments.length - 2];
        if (last && previous && last.text.length < this.#config.minChunkLength) {
            segments.splice(segments.length - 2, 2, {
                text: previous.text + previous.separator + last.text,
                separator: last.separator,
            });
        }
        return segments;
    }

    #splitSimple(text: string, protectedRanges: Range[] | null): SplitSegment[] {
        const maxLength = this.#config.maxChunkLength;
        const boundaries = findBoundaries(text);
        const segments: SplitSegment[] = [];
        let start = 0;

        while (text.slice(start).trimEnd().length > maxLength) {
            const cut =
                (protectedRanges ? chooseCut(boundaries, start, maxLength, protectedRanges) : undefined) ??
                chooseCut(boundaries, start, maxLength, []) ??
                boundaries.find((boundary) => boundary.start > start);

            if (!cut) break;

            segments.push({ text: text.slice(start, cut.start), separator: text.slice(cut.start, cut.end) });
            start = cut.end;
        }

        segments.push({ text: text.slice(start), separator: '' });
        return segments;
    }

    /** Append a closing fence if the text opens one it never closes. */
    static ensureCodeFenceClosed(text: string): string {
        const fenceCount = (text.match(/```/g) ?? []).length;
        if (fenceCount % 2 === 1) {
            return text + '\n```';
        }
        return text;
    }
}

/** Functional form: ordered chunk texts for `text` under `mode`. */
export function split(text: string, mode: SplitMode, config: Omit<SplitConfig, 'mode'>): string[] {
    return new ResponseSplitter({ ...config, mode }).splitTexts(text, mode);
}

function whole(text: string): SplitSegment {
    return { text, separator: '' };
}

/** Whitespace runs that may serve as cuts; leading and trailing runs never do. */
function findBoundaries(text: string): Boundary[] {
    const boundaries: Boundary[] = [];
    let match: RegExpExecArray | null;

    WHITESPACE_RUN.lastIndex = 0;
    while ((match = WHITESPACE_RUN.exec(text)) !== null) {
        const start = match.index;
        const end = start + match[0].length;
        if (start === 0 || end === text.length) continue;

        boundaries.push({ start, end, kind: classify(match[0], text.slice(0, start)) });
    }
    return boundaries;
}

function classify(run: string, before: string): BoundaryKind {
    if (PARAGRAPH_BREAK.test(run)) return 'paragraph';
    if (run.includes('\n')) return 'line';
    if (SENTENCE_END.test(before)) return 'sentence';
    return 'word';
}

/**
 * Latest structural cut (paragraph, line or sentence) that keeps the chunk within
 * `maxLength`, else the latest word gap; cuts inside `protectedRanges` are skipped.
 */
function chooseCut(
    boundaries: Boundary[],
    start: number,
    maxLength: number,
    protectedRanges: Range[],
): Boundary | undefined {
    let structural: Boundary | undefined;
    let word: Boundary | undefined;

    for (const boundary of boundaries) {
        if (boundary.start <= start) continue;
        if (boundary.start - start > maxLength) break;
        if (isProtected(boundary, protectedRanges)) continue;

        if (boundary.kind === 'word') {
            word = boundary;
        } else {
            structural = boundary;
        }
    }

    return structural ?? word;
}

function isProtected(boundary: Boundary, ranges: Range[]): boolean {
    return ranges.some((range) => boundary.start > range.start && boundary.start < range.end);
}

/**
 * Earliest inline-span marker that is still open at the end of `text` and could
 * be closed by text appended later, or -1. Inline spans never cross a line break,
 * so only markers on the last line outside every closed span and fence count.
 */
export function findOpenSpanStart(text: string): number {
    const ranges = findProtectedRanges(text);

    for (let i = text.lastIndexOf('\n') + 1; i < text.length; i++) {
        if (!couldOpenSpan(text, i)) continue;
        if (ranges.some((range) => i >= range.start && i < range.end)) continue;
        return i;
    }
    return -1;
}

function couldOpenSpan(text: string, index: number): boolean {
    const char = text.charAt(index);
    const previous = text.charAt(index - 1);
    const next: string | undefined = index + 1 < text.length ? text.charAt(index + 1) : undefined;
    switch (char) {
        case '`':
        case '~':
        case '[':
            return true;
        case '*':
            // a lone '*' before a space opens neither italics nor bold
            return next === undefined || next === '*' || previous === '*' || !/\s/.test(next);
        case '_':
            return next === undefined || next === '_' || previous === '_' || !/\w/.test(previous);
        default:
            return false;
    }
}

function findProtectedRanges(text: string): Range[] {
    const ranges: Range[] = [];
    let match: RegExpExecArray | null;

    CODE_FENCE_PATTERN.lastIndex = 0;
    while ((match = CODE_FENCE_PATTERN.exec(text)) !== null) {
        ranges.push({ start: match.index, end: match.index + match[0].length });
    }

    const fences = [...ranges];
    for (const pattern of INLINE_SPAN_PATTERNS) {
        pattern.lastIndex = 0;
        while ((match = pattern.exec(text)) !== null) {
            const range = { start: match.index, end: match.index + match[0].length };
            if (!fences.some((fence) => range.start >= fence.start && range.start < fence.end)) {
                ranges.push(range);
            }
        }
    }

    return ranges;
}
