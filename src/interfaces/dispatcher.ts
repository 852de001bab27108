import { randomUUID } from 'node:crypto';
import type {
  AnyDeliveryPlan,
  ChatId,
  ConversationTurn,
  DeliveryOutcome,
  InterruptEvent,
  TurnOutcome,
  ResponseSource,
} from '../types/delivery.js';
import type { InboundChannel, InboundMessage } from '../types/messaging.js';
import { SessionConflictError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import type { DeliveryPlanner, PlanRequest } from '../services/delivery-plan.js';
import type { DeliveryScheduler } from '../services/delivery-scheduler.js';
import { createDelayPolicy } from '../services/delay-policy.js';
import {
  InterruptCoordinator,
  type InterruptCoordinatorOptions,
  type InterruptDecision,
} from '../services/interrupt-coordinator.js';
import { StreamAdapter } from '../services/stream-adapter.js';

export interface DispatcherOptions {
  /** Platform adapter whose inbound messages feed the coordinator. */
  channel?: InboundChannel;
  interrupts?: Partial<InterruptCoordinatorOptions>;
  /**
   * Called with the terminal outcome of every delivery the dispatcher started,
   * and with a `skipped` outcome for a turn whose response was empty.
   */
  onOutcome?: (outcome: TurnOutcome, turn?: ConversationTurn) => void;
  now?: () => number;
}

/**
 * Response Delivery Dispatcher
 *
 * Connects an inbound chat channel to the delivery pipeline:
 *   1. Normalized inbound messages become interrupt events for the coordinator.
 *   2. Each turn the coordinator releases is answered by the response source.
 *   3. The response is planned (whole text, or chunk by chunk while it streams)
 *      and handed to the scheduler, which paces it out through the sink.
 */
export class Dispatcher {
  readonly #source: ResponseSource;
  readonly #scheduler: DeliveryScheduler;
  readonly #planner: DeliveryPlanner;
  readonly #coordinator: InterruptCoordinator;
  readonly #channel?: InboundChannel;
  readonly #onOutcome?: DispatcherOptions['onOutcome'];
  readonly #now: () => number;

  constructor(
    source: ResponseSource,
    scheduler: DeliveryScheduler,
    planner: DeliveryPlanner,
    options: DispatcherOptions = {},
  ) {
    this.#source = source;
    this.#scheduler = scheduler;
    this.#planner = planner;
    this.#channel = options.channel;
    this.#onOutcome = options.onOutcome;
    this.#now = options.now ?? (() => Date.now());
    this.#coordinator = new InterruptCoordinator(
      scheduler.registry,
      planner.modeSelector,
      (turn) => this.#handleTurn(turn),
      options.interrupts,
    );

    if (this.#channel) {
      this.#channel.onMessage = async (message) => {
        this.handleInbound(message);
      };
    }
  }

  get coordinator(): InterruptCoordinator {
    return this.#coordinator;
  }

  get scheduler(): DeliveryScheduler {
    return this.#scheduler;
  }

  /** Feed one inbound message into the pipeline. Messages without text are ignored. */
  handleInbound(message: InboundMessage): InterruptDecision | null {
    const text = message.text?.trim();
    if (!text) {
      void logThought(`[Dispatcher] Ignoring message without text in chat ${message.chatId}.`);
      return null;
    }

    const event: InterruptEvent = {
      chatId: message.chatId,
      arrivalTime: this.#now(),
      rawText: text,
      messageId: message.messageId,
      senderId: message.senderId,
      replyToMessageId: message.replyToMessageId,
    };
    return this.#coordinator.submit(event);
  }

  /**
   * Deliver an agent-initiated message outside of any conversation turn.
   * Waits for an active answer-safe delivery in the chat to finish first.
   */
  async sendProactive(chatId: ChatId, text: string): Promise<DeliveryOutcome> {
    const plan = this.#planner.build(text, { requestId: randomUUID(), context: { chatId } });
    const outcome = await this.#deliver(plan);
    this.#onOutcome?.(outcome);
    return outcome;
  }

  /** Stop the channel, cancel every active delivery and wait for them to stop. */
  async shutdown(): Promise<DeliveryOutcome[]> {
    this.#coordinator.dispose();
    this.#channel?.stop();
    return this.#scheduler.cancelAll('shutdown');
  }

  // ── Turn Handling ───────────────────────────────────────────────────────────

  async #handleTurn(turn: ConversationTurn): Promise<void> {
    const response = await this.#source.generate(turn);
    const request: PlanRequest = {
      requestId: turn.turnId,
      context: turn.context,
      mode: response.mode,
      kind: turn.kind,
      replyTo: turn.replyTo,
    };

    let plan: AnyDeliveryPlan;
    if (response.stream) {
      const adapter = new StreamAdapter(
        this.#planner.splitter,
        createDelayPolicy(this.#planner.delaySpec),
        response.mode,
      );
      plan = this.#planner.buildStreaming(adapter.adapt(response.stream), request);
    } else if (response.text?.trim()) {
      plan = this.#planner.build(response.text, request);
    } else {
      void logThought(`[Dispatcher] Response ${response.requestId} for chat ${turn.event.chatId} was empty; nothing to deliver.`);
      this.#onOutcome?.(
        { status: 'skipped', reason: 'empty_response', requestId: turn.turnId, chatId: turn.event.chatId, deliveredCount: 0 },
        turn,
      );
      return;
    }

    const outcome = await this.#deliver(plan);
    this.#onOutcome?.(outcome, turn);
  }

  async #deliver(plan: AnyDeliveryPlan): Promise<DeliveryOutcome> {
    for (;;) {
      try {
        return await this.#scheduler.deliver(plan);
      } catch (err) {
        if (!(err instanceof SessionConflictError)) throw err;
        await this.#scheduler.registry.get(plan.chatId)?.finished;
      }
    }
  }
}
