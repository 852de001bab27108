/** Chat identifier as handed over by the platform adapter. */
export type ChatId = string | number;

/** Splitting policies. `markdown` and `structured` currently fall back to `none`. */
export type SplitMode = 'none' | 'simple' | 'simple_improved' | 'markdown' | 'structured';

export const SPLIT_MODES: readonly SplitMode[] = ['none', 'simple', 'simple_improved', 'markdown', 'structured'];

/** Interruption policy for an active delivery. */
export type ModePolicy = 'reply_safe' | 'answer_safe';

export type DelayStrategy = 'none' | 'constant' | 'uniform' | 'proportional';

export const DELAY_STRATEGIES: readonly DelayStrategy[] = ['none', 'constant', 'uniform', 'proportional'];

export interface SplitConfig {
  mode: SplitMode;
  maxChunkLength: number;
  minChunkLength: number;
}

export interface DelaySpec {
  strategy: DelayStrategy;
  minMs: number;
  maxMs: number;
  /** Typing speed used by the `proportional` strategy. */
  msPerChar: number;
}

/** One outbound message of a split response. */
export interface MessageChunk {
  readonly index: number;
  readonly text: string;
  /** Whitespace consumed at the cut after this chunk (`''` for the last one). */
  readonly separator: string;
  readonly estimatedDelayMs: number;
}

/** The interrupted turn a `reply` delivery refers back to. */
export interface ReplyReference {
  /** Turn whose delivery was interrupted. */
  turnId: string;
  /** Plan of the interrupted delivery, when it had already started. */
  planId?: string;
  /** Platform message id of the user message being replied to, when known. */
  messageId?: string | number;
}

export type DeliveryKind = 'answer' | 'reply';

export interface DeliveryPlan {
  readonly planId: string;
  readonly requestId: string;
  readonly chatId: ChatId;
  readonly chunks: readonly MessageChunk[];
  readonly modePolicy: ModePolicy;
  readonly kind: DeliveryKind;
  readonly replyTo?: ReplyReference;
  readonly createdAt: string;
}

/** Plan for a response whose chunks are still being produced by a stream. */
export interface StreamingDeliveryPlan extends Omit<DeliveryPlan, 'chunks'> {
  readonly chunks: AsyncIterable<MessageChunk>;
}

export type SessionStatus = 'pending' | 'typing_shown' | 'sending' | 'completed' | 'cancelled' | 'failed';

export const TERMINAL_STATUSES: ReadonlySet<SessionStatus> = new Set(['completed', 'cancelled', 'failed']);

/** A generated response handed over by the response source. */
export interface RawResponse {
  requestId: string;
  mode: SplitMode;
  text?: string;
  stream?: AsyncIterable<string>;
}

/** Inbound user activity for a chat, produced by the platform adapter. */
export interface InterruptEvent {
  chatId: ChatId;
  arrivalTime: number;
  rawText: string;
  messageId?: string | number;
  senderId?: string;
  /** The earlier message the user quoted with this one. */
  replyToMessageId?: string | number;
}

/** What the ModeSelector looks at when picking a policy. */
export interface ChatContext {
  chatId: ChatId;
  /** Set when the bot is explicitly replying to a specific prior message. */
  replyToMessageId?: string | number;
}

/** A unit of work the coordinator hands to the turn handler. */
export interface ConversationTurn {
  turnId: string;
  event: InterruptEvent;
  context: ChatContext;
  kind: DeliveryKind;
  replyTo?: ReplyReference;
  /** Number of inbound events merged into this turn. */
  mergedCount: number;
}

// ── Sink collaborator ────────────────────────────────────────────────────────

export type SinkResult =
  | { status: 'ack'; messageId?: string | number }
  | { status: 'transient'; reason: string }
  | { status: 'permanent'; reason: string };

export interface DispatchContext {
  planId: string;
  requestId: string;
  kind: DeliveryKind;
  replyTo?: ReplyReference;
}

/** Outbound side of a chat platform. */
export interface DeliverySink {
  /** `signal` is aborted when the dispatch times out; the scheduler waits for the call to settle either way. */
  sendChunk(chatId: ChatId, chunk: MessageChunk, context: DispatchContext, signal?: AbortSignal): Promise<SinkResult>;
  setTyping(chatId: ChatId, active: boolean): Promise<void>;
}

/** Model-provider side: produces a response for a turn. */
export interface ResponseSource {
  generate(turn: ConversationTurn): Promise<RawResponse>;
}

// ── Session outcome ──────────────────────────────────────────────────────────

export type AnyDeliveryPlan = DeliveryPlan | StreamingDeliveryPlan;

interface OutcomeBase {
  sessionId: string;
  planId: string;
  chatId: ChatId;
  /** Chunks acknowledged by the sink before the session ended. */
  deliveredCount: number;
  durationMs: number;
}

export type DeliveryOutcome =
  | (OutcomeBase & { status: 'completed' })
  | (OutcomeBase & { status: 'cancelled'; reason: string })
  | (OutcomeBase & { status: 'failed'; error: Error });

/** A turn whose response had nothing to send, so no session was started. */
export interface SkippedDelivery {
  status: 'skipped';
  reason: 'empty_response';
  requestId: string;
  chatId: ChatId;
  deliveredCount: 0;
}

/** What became of one conversation turn. */
export type TurnOutcome = DeliveryOutcome | SkippedDelivery;

/** Read-only view of a session for dashboards and the control-plane API. */
export interface SessionSnapshot {
  sessionId: string;
  planId: string;
  requestId: string;
  chatId: ChatId;
  status: SessionStatus;
  modePolicy: ModePolicy;
  kind: DeliveryKind;
  cursor: number;
  deliveredCount: number;
  /** Unknown while the chunks are still streaming in. */
  totalChunks?: number;
  cancelRequested: boolean;
  startedAt: string;
}
