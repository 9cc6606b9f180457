/**
 * Core Bot Utilities - Bot lifecycle and chat delivery
 *
 * Key Features:
 * - Bot instance creation with a global error handler
 * - Message handler registration for inbound client messages
 * - Chat delivery that classifies Telegram failures for the reply route
 *
 * @since 2025
 */
import { Telegraf, type Context } from 'telegraf';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { ChatSender, SentChatMessage } from './types/index.js';
import type { InboundMessageHandler } from './handlers/inboundMessage.js';
import {
    ChatDeliveryError,
    describeTelegramError,
    getErrorStack,
    isUnreachableChatError
} from './utils/errorHandler.js';

/**
 * Creates a new Telegraf bot instance
 *
 * @param token - Telegram Bot API token
 */
export function createBot(token: string): Telegraf {
    if (!token) {
        throw new Error('Telegram bot token is required');
    }

    const bot = new Telegraf(token);

    // Updates are always acknowledged; a failing handler only gets logged
    bot.catch((error: unknown, ctx: Context) => {
        const details = describeTelegramError(error);
        LogEngine.error('Error while handling Telegram update', {
            error: details.description,
            errorCode: details.errorCode,
            updateId: ctx.update.update_id,
            chatId: ctx.chat?.id,
            userId: ctx.from?.id,
            stack: getErrorStack(error)
        });
    });

    return bot;
}

/**
 * Routes every incoming message to the inbound handler.
 */
export function registerHandlers(bot: Telegraf, inboundHandler: InboundMessageHandler): void {
    bot.on('message', async (ctx) => {
        const outcome = await inboundHandler.handle(ctx);
        LogEngine.debug('Telegram message processed', {
            updateId: ctx.update.update_id,
            outcome
        });
    });
}

/**
 * Sends plain text through the Bot API.
 *
 * Every failure is rethrown as ChatDeliveryError. Unreachable chats and rate
 * limits are logged as warnings.
 */
export class TelegramChatSender implements ChatSender {
    private readonly bot: Telegraf;

    constructor(bot: Telegraf) {
        this.bot = bot;
    }

    async sendText(chatId: number, text: string): Promise<SentChatMessage> {
        try {
            const sent = await this.bot.telegram.sendMessage(chatId, text);
            return { chatId: sent.chat.id, messageId: sent.message_id };
        } catch (error) {
            const details = describeTelegramError(error);

            if (isUnreachableChatError(error)) {
                LogEngine.warn('Chat is unreachable - bot blocked or chat deleted', {
                    chatId,
                    description: details.description
                });
            } else if (details.errorCode === 429) {
                LogEngine.warn('Rate limit exceeded when sending message', {
                    chatId,
                    retryAfter: details.retryAfter
                });
            } else {
                LogEngine.error('Error sending message', {
                    error: details.description,
                    errorCode: details.errorCode,
                    chatId,
                    textLength: text.length
                });
            }

            throw new ChatDeliveryError(chatId, error);
        }
    }
}
