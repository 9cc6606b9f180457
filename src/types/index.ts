/**
 * Relay Type Definitions
 *
 * Shared types for the Telegram side of the relay and the Pager wire format.
 */

// Telegram Bot API failure as thrown by Telegraf
export interface TelegramError extends Error {
  response?: {
    error_code: number;
    description: string;
    parameters?: {
      retry_after?: number;
    };
  };
}

// Result of a single chat send
export interface SentChatMessage {
  chatId: number;
  messageId: number;
}

/**
 * Sends plain text into a Telegram chat.
 *
 * Implementations throw ChatDeliveryError when the Bot API rejects the send.
 */
export interface ChatSender {
  sendText(chatId: number, text: string): Promise<SentChatMessage>;
}

export type {
  PagerAttachment,
  PagerNotification,
  PagerReplyPayload,
  PagerReplyResponse
} from './pagerEvents.js';

export {
  PAGER_MESSAGE_CREATED,
  pagerReplySchema,
  pagerAttachmentSchema,
  extractAttachmentUrls
} from './pagerEvents.js';
