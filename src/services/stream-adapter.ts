import type { MessageChunk, SplitMode } from '../types/delivery.js';
import type { DelayPolicy } from './delay-policy.js';
import { toChunks } from './delivery-plan.js';
import { findOpenSpanStart, type ResponseSplitter, type SplitSegment } from './response-splitter.js';

/** Modes that only ever produce one chunk, so nothing can be emitted before the end. */
const WHOLE_TEXT_MODES: ReadonlySet<SplitMode> = new Set(['none', 'markdown', 'structured']);

/**
 * Turns a token stream into chunks while it is still arriving.
 *
 * The buffer is re-split on every push, but the first chunk is only emitted once
 * the buffer reaches more than `maxChunkLength + 1` characters past its start and
 * a further chunk follows it: by then every cut the splitter could choose for it
 * has been seen. In `simple_improved` mode a later token can still close an
 * inline span and so protect the cut, so the chunk is also held back while a span
 * opened inside it is unclosed. Emitted chunks are final and match what splitting
 * the whole text at once would give.
 */
export class StreamAdapter {
    readonly #splitter: ResponseSplitter;
    readonly #estimator: DelayPolicy;
    readonly #mode: SplitMode;
    #pending = '';
    #emitted = 0;
    #ended = false;

    constructor(splitter: ResponseSplitter, estimator: DelayPolicy, mode: SplitMode = splitter.config.mode) {
        this.#splitter = splitter;
        this.#estimator = estimator;
        this.#mode = mode;
    }

    get emittedCount(): number {
        return this.#emitted;
    }

    get bufferedText(): string {
        return this.#pending;
    }

    /** Buffer `text` and return the chunks that became stable. */
    push(text: string): MessageChunk[] {
        if (this.#ended) {
            throw new Error('[StreamAdapter] push() after end().');
        }
        this.#pending += text;
        if (WHOLE_TEXT_MODES.has(this.#mode)) return [];

        const stable: MessageChunk[] = [];
        const stabilityWindow = this.#splitter.config.maxChunkLength + 1;

        while (this.#pending.trimEnd().length > stabilityWindow) {
            const { segments } = this.#splitter.split(this.#pending, this.#mode);
            const first = segments[0];
            if (!first || segments.length < 2) break;
            if (this.#mode === 'simple_improved') {
                const open = findOpenSpanStart(this.#pending);
                if (open !== -1 && open < first.text.length) break;
            }

            stable.push(...this.#emit([first]));
            this.#pending = this.#pending.slice(first.text.length + first.separator.length);
        }

        return stable;
    }

    /** Flush whatever is left, short or not. An empty stream yields one empty chunk. */
    end(): MessageChunk[] {
        if (this.#ended) return [];
        this.#ended = true;

        if (this.#pending.length === 0 && this.#emitted > 0) return [];

        const { segments } = this.#splitter.split(this.#pending, this.#mode);
        this.#pending = '';
        return this.#emit(segments);
    }

    /** Adapt an async token source into a chunk sequence. */
    async *adapt(source: AsyncIterable<string>): AsyncGenerator<MessageChunk> {
        for await (const token of source) {
            yield* this.push(token);
        }
        yield* this.end();
    }

    #emit(segments: SplitSegment[]): MessageChunk[] {
        const chunks = toChunks(segments, this.#estimator, this.#emitted);
        this.#emitted += chunks.length;
        return chunks;
    }
}
