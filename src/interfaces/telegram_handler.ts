import TelegramBot from 'node-telegram-bot-api';
import type {
  ChatId,
  DeliverySink,
  DispatchContext,
  MessageChunk,
  SinkResult,
} from '../types/delivery.js';
import type { InboundChannel, InboundMessage } from '../types/messaging.js';
import { ResponseSplitter } from '../services/response-splitter.js';
import { logThought } from '../utils/logger.js';
import { markdownToTelegramHtml } from '../utils/telegram-html.js';

export interface TelegramHandlerOptions {
  /** Long-poll for inbound messages. Disable for send-only use. */
  polling: boolean;
  /** Render each chunk's Markdown as Telegram HTML. */
  convertMarkdown: boolean;
}

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('response' in err)) return undefined;
  const { response } = err;
  if (typeof response !== 'object' || response === null || !('statusCode' in response)) return undefined;
  return typeof response.statusCode === 'number' ? response.statusCode : undefined;
}

/**
 * Map a Bot API failure onto the sink's result kinds: rate limits, server
 * errors and network failures are worth retrying; other 4xx answers are not.
 */
export function classifyTelegramError(err: unknown): SinkResult {
  const reason = err instanceof Error ? err.message : String(err);
  const status = statusCodeOf(err);
  if (status === undefined || status === 429 || status >= 500) {
    return { status: 'transient', reason };
  }
  return { status: 'permanent', reason };
}

/** Telegram refused the markup of an HTML message. */
function isMarkupRejection(err: unknown): boolean {
  return statusCodeOf(err) === 400 && err instanceof Error && err.message.includes("can't parse entities");
}

function toTelegramMessageId(id: string | number | undefined): number | undefined {
  if (id === undefined) return undefined;
  const numeric = typeof id === 'number' ? id : Number(id);
  return Number.isInteger(numeric) ? numeric : undefined;
}

/**
 * Wraps the Telegram Bot API to provide:
 *   - Inbound message normalization for the dispatcher
 *   - The delivery sink: paced chunk sends and the typing indicator
 */
export class TelegramHandler implements DeliverySink, InboundChannel {
  readonly #bot: TelegramBot;
  readonly #convertMarkdown: boolean;

  /**
   * @param token - Telegram Bot token from @BotFather (TELEGRAM_BOT_TOKEN).
   */
  constructor(token: string, options: Partial<TelegramHandlerOptions> = {}) {
    this.#bot = new TelegramBot(token, { polling: options.polling ?? true });
    this.#convertMarkdown = options.convertMarkdown ?? false;
    this.#registerListeners();
  }

  /** Callback invoked by the dispatcher for every normalized message. */
  onMessage?: (message: InboundMessage) => Promise<void>;

  #registerListeners(): void {
    this.#bot.on('message', async (msg) => {
      if (!msg.from || msg.from.is_bot) return;

      const inbound: InboundMessage = {
        platform: 'telegram',
        senderId: String(msg.from.id),
        chatId: msg.chat.id,
        messageId: msg.message_id,
        replyToMessageId: msg.reply_to_message?.message_id,
        text: msg.text,
        rawPayload: msg,
      };

      try {
        await this.onMessage?.(inbound);
      } catch (err) {
        console.error('[TelegramHandler] Message handler failed:', err);
      }
    });

    this.#bot.on('polling_error', (err) => {
      console.error('[TelegramHandler] Polling error:', err.message);
    });
  }

  // ── Delivery Sink ─────────────────────────────────────────────────────────────

  /**
   * Send one chunk. The first chunk of a reply delivery quotes the message it
   * answers; an unbalanced code fence is closed so the chunk renders on its own.
   *
   * The Bot API call cannot be aborted once made, so the timeout signal is only
   * checked before sending.
   */
  async sendChunk(
    chatId: ChatId,
    chunk: MessageChunk,
    context: DispatchContext,
    signal?: AbortSignal,
  ): Promise<SinkResult> {
    if (signal?.aborted) return { status: 'transient', reason: 'Dispatch aborted before sending.' };

    const replyToMessageId =
      context.kind === 'reply' && chunk.index === 0
        ? toTelegramMessageId(context.replyTo?.messageId)
        : undefined;
    const text = ResponseSplitter.ensureCodeFenceClosed(chunk.text);
    const options: TelegramBot.SendMessageOptions =
      replyToMessageId !== undefined ? { reply_to_message_id: replyToMessageId } : {};

    try {
      const sent = this.#convertMarkdown
        ? await this.#sendHtml(chatId, text, options)
        : await this.#bot.sendMessage(chatId, text, options);
      return { status: 'ack', messageId: sent.message_id };
    } catch (err) {
      const result = classifyTelegramError(err);
      void logThought(`[TelegramHandler] Chunk ${chunk.index} of plan ${context.planId} to chat ${chatId} failed: ${result.status}.`);
      return result;
    }
  }

  async #sendHtml(chatId: ChatId, text: string, options: TelegramBot.SendMessageOptions): Promise<TelegramBot.Message> {
    try {
      return await this.#bot.sendMessage(chatId, markdownToTelegramHtml(text), { ...options, parse_mode: 'HTML' });
    } catch (err) {
      if (!isMarkupRejection(err)) throw err;
      console.warn(`[TelegramHandler] Markup rejected for chat ${chatId}; resending as plain text.`);
      return this.#bot.sendMessage(chatId, text, options);
    }
  }

  /**
   * Telegram clears the typing action by itself after a few seconds or on the
   * next message, so hiding it is a no-op.
   */
  async setTyping(chatId: ChatId, active: boolean): Promise<void> {
    if (!active) return;
    await this.#bot.sendChatAction(chatId, 'typing');
  }

  /** Gracefully stop the polling loop. */
  stop(): void {
    this.#bot.stopPolling().catch((err: unknown) => {
      console.error('[TelegramHandler] Failed to stop polling:', err instanceof Error ? err.message : String(err));
    });
  }
}
