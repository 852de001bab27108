import { randomUUID } from 'node:crypto';
import type {
    ChatContext,
    DelaySpec,
    DeliveryKind,
    DeliveryPlan,
    MessageChunk,
    ModePolicy,
    ReplyReference,
    SplitConfig,
    SplitMode,
    StreamingDeliveryPlan,
} from '../types/delivery.js';
import { ResponseSplitter, type SplitSegment } from './response-splitter.js';
import { createDelayPolicy, validateDelaySpec, type DelayPolicy } from './delay-policy.js';
import { ModeSelector } from './mode-selector.js';

export interface PlanOptions {
    split: SplitConfig;
    delay: DelaySpec;
    modeSelector?: ModeSelector;
}

export interface PlanRequest {
    requestId: string;
    context: ChatContext;
    /** Overrides the configured split mode for this response. */
    mode?: SplitMode;
    kind?: DeliveryKind;
    replyTo?: ReplyReference;
}

/** Turn split segments into indexed, immutable chunks. */
export function toChunks(segments: readonly SplitSegment[], delay: DelayPolicy, startIndex = 0): MessageChunk[] {
    return segments.map((segment, offset) =>
        Object.freeze({
            index: startIndex + offset,
            text: segment.text,
            separator: segment.separator,
            estimatedDelayMs: delay.estimate(segment.text),
        }),
    );
}

/**
 * Builds delivery plans for generated responses.
 *
 * Configuration is validated up front: an invalid split or delay config throws
 * `ConfigError` here, before anything is sent.
 */
export class DeliveryPlanner {
    readonly #splitter: ResponseSplitter;
    readonly #delaySpec: DelaySpec;
    readonly #estimator: DelayPolicy;
    readonly #modeSelector: ModeSelector;

    constructor(options: PlanOptions) {
        this.#splitter = new ResponseSplitter(options.split);
        this.#delaySpec = validateDelaySpec({ ...options.delay });
        this.#estimator = createDelayPolicy(this.#delaySpec);
        this.#modeSelector = options.modeSelector ?? new ModeSelector();
    }

    get splitter(): ResponseSplitter {
        return this.#splitter;
    }

    get delaySpec(): DelaySpec {
        return { ...this.#delaySpec };
    }

    get modeSelector(): ModeSelector {
        return this.#modeSelector;
    }

    build(text: string, request: PlanRequest): DeliveryPlan {
        const result = this.#splitter.split(text, request.mode ?? this.#splitter.config.mode);
        const chunks = Object.freeze(toChunks(result.segments, this.#estimator));

        return Object.freeze({
            ...this.#header(request),
            chunks,
        });
    }

    /** Plan header for a response whose chunks come from a stream. */
    buildStreaming(chunks: AsyncIterable<MessageChunk>, request: PlanRequest): StreamingDeliveryPlan {
        return Object.freeze({
            ...this.#header(request),
            chunks,
        });
    }

    policyFor(context: ChatContext): ModePolicy {
        return this.#modeSelector.modeFor(context);
    }

    #header(request: PlanRequest): Omit<DeliveryPlan, 'chunks'> {
        return {
            planId: randomUUID(),
            requestId: request.requestId,
            chatId: request.context.chatId,
            modePolicy: this.policyFor(request.context),
            kind: request.kind ?? 'answer',
            replyTo: request.replyTo,
            createdAt: new Date().toISOString(),
        };
    }
}

/** One-shot form of {@link DeliveryPlanner.build}. */
export function buildDeliveryPlan(text: string, request: PlanRequest, options: PlanOptions): DeliveryPlan {
    return new DeliveryPlanner(options).build(text, request);
}
