import type { ChatId } from './delivery.js';

/** Supported messaging platforms. */
export type Platform = 'telegram';

/** A normalized inbound message from a chat platform. */
export interface InboundMessage {
  platform: Platform;
  /** The sender's user ID as a string (platform-specific). */
  senderId: string;
  /** The destination chat/channel ID used for reply routing. */
  chatId: ChatId;
  messageId?: number;
  /** Id of the earlier message this one quotes, when the user replied to it. */
  replyToMessageId?: number;
  text?: string;
  /** Original platform payload, kept for platform-specific extensions. */
  rawPayload: unknown;
}

/** Platform adapter feeding inbound messages to the dispatcher. */
export interface InboundChannel {
  onMessage?: (message: InboundMessage) => Promise<void>;
  stop(): void;
}
