/**
 * Inbound Message Handler - Telegram client messages to Pager
 *
 * Handles private-chat messages from clients: records which chat the client
 * writes from, then hands a notification to the Pager dispatcher. Group chats,
 * empty messages, service messages and bot commands are ignored.
 *
 * @since 2025
 */

import type { Context } from 'telegraf';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { MappingStore } from '../services/mappingStore.js';
import type { NotificationSink } from '../services/pager.js';
import { PAGER_MESSAGE_CREATED, type PagerNotification } from '../types/index.js';
import { clientExternalIdFromUser, messageExternalId } from '../utils/identifiers.js';
import {
    getDisplayName,
    getMessageText,
    getMessageTypeInfo,
    isBotCommand
} from '../utils/messageContentExtractor.js';

export type InboundOutcome =
    | 'forwarded'
    | 'no_message'
    | 'not_private'
    | 'empty_text'
    | 'bot_command';

export class InboundMessageHandler {
    private readonly store: MappingStore;
    private readonly sink: NotificationSink;

    constructor(store: MappingStore, sink: NotificationSink) {
        this.store = store;
        this.sink = sink;
    }

    /**
     * Processes one update. A mapping store failure rejects; everything else
     * resolves with what was done.
     */
    async handle(ctx: Context): Promise<InboundOutcome> {
        const message = ctx.message;
        const chat = ctx.chat;
        const from = ctx.from;

        if (!message || !chat || !from) {
            return 'no_message';
        }

        if (chat.type !== 'private') {
            LogEngine.debug('Ignoring message outside a private chat', {
                chatId: chat.id,
                chatType: chat.type
            });
            return 'not_private';
        }

        const text = getMessageText(message);
        if (text.trim().length === 0) {
            LogEngine.debug('Ignoring message without text', {
                chatId: chat.id,
                ...getMessageTypeInfo(message)
            });
            return 'empty_text';
        }

        if (isBotCommand(message)) {
            LogEngine.debug('Ignoring bot command', { chatId: chat.id, userId: from.id });
            return 'bot_command';
        }

        const clientExternalId = clientExternalIdFromUser(from.id);
        await this.store.upsert(clientExternalId, chat.id);

        const client: PagerNotification['client'] = { externalId: clientExternalId };
        const name = getDisplayName(from);
        if (name) {
            client.name = name;
        }

        const notification: PagerNotification = {
            event: PAGER_MESSAGE_CREATED,
            client,
            message: {
                externalId: messageExternalId(from.id, chat.id, message.message_id),
                direction: 'incoming',
                text,
                attachments: []
            }
        };

        this.sink.dispatch(notification);

        LogEngine.info('Client message forwarded to Pager', {
            clientExternalId,
            chatId: chat.id,
            messageId: message.message_id,
            textLength: text.length
        });

        return 'forwarded';
    }
}
