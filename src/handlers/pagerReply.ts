/**
 * Pager Reply Handler - Agent Response Routing
 *
 * Delivers agent replies pushed by Pager to the Telegram chat the client last
 * wrote from. The reply text goes out first (split when it exceeds Telegram's
 * message limit), followed by the attachment URLs, one per line, packed into
 * as few messages as the limit allows.
 *
 * Failure mapping:
 * - wrong channel key: UnauthorizedError (401)
 * - unusable body, missing or unknown client: BadRequestError (400)
 * - Telegram send failure: ChatDeliveryError (502, or 503 when rate limited)
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';
import type { MappingStore } from '../services/mappingStore.js';
import {
    type ChatSender,
    type PagerReplyResponse,
    type SentChatMessage,
    PAGER_MESSAGE_CREATED,
    extractAttachmentUrls,
    pagerReplySchema
} from '../types/index.js';
import { BadRequestError, UnauthorizedError } from '../utils/errorHandler.js';
import { deliveredMessageId, undeliveredMessageId } from '../utils/identifiers.js';
import { secretsMatch } from '../utils/secrets.js';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

export const IGNORED_EVENT_RESPONSE: PagerReplyResponse = { externalMessageId: 'ignored' };

/**
 * Splits text into consecutive pieces of at most `limit` UTF-16 code units,
 * never cutting a surrogate pair in half.
 */
export function splitMessageText(text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
    if (text.length <= limit) {
        return [text];
    }

    const chunks: string[] = [];
    let start = 0;
    while (start < text.length) {
        let end = Math.min(start + limit, text.length);
        if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
            end -= 1;
        }
        chunks.push(text.slice(start, end));
        start = end;
    }
    return chunks;
}

/**
 * Joins lines with newlines into as few messages as fit within `limit`,
 * breaking only between lines. A single line longer than the limit is split
 * on its own.
 */
export function packLines(lines: readonly string[], limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
    const chunks: string[] = [];
    let current = '';

    for (const line of lines) {
        for (const piece of splitMessageText(line, limit)) {
            if (current.length === 0) {
                current = piece;
            } else if (current.length + 1 + piece.length <= limit) {
                current += `\n${piece}`;
            } else {
                chunks.push(current);
                current = piece;
            }
        }
    }

    if (current.length > 0) {
        chunks.push(current);
    }
    return chunks;
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

export class PagerReplyHandler {
    private readonly store: MappingStore;
    private readonly sender: ChatSender;
    private readonly channelKey: string;

    constructor(store: MappingStore, sender: ChatSender, channelKey: string) {
        this.store = store;
        this.sender = sender;
        this.channelKey = channelKey;
    }

    /**
     * @throws UnauthorizedError unless the key equals the configured channel key
     */
    authenticate(providedKey: string | undefined): void {
        if (!secretsMatch(providedKey, this.channelKey)) {
            LogEngine.warn('Rejected Pager reply with a bad channel key', {
                keyPresent: providedKey !== undefined
            });
            throw new UnauthorizedError('bad x-channel-key');
        }
    }

    /**
     * Delivers one reply event and returns the id Pager records for it.
     */
    async handle(body: unknown): Promise<PagerReplyResponse> {
        const parsed = pagerReplySchema.safeParse(body);
        if (!parsed.success) {
            throw new BadRequestError('request body must be a JSON object');
        }
        const event = parsed.data;

        if (event.event !== PAGER_MESSAGE_CREATED) {
            LogEngine.debug('Ignoring Pager event', {
                event: typeof event.event === 'string' ? event.event : String(event.event)
            });
            return IGNORED_EVENT_RESPONSE;
        }

        const clientExternalId = event.client?.externalId;
        if (typeof clientExternalId !== 'string' || clientExternalId.length === 0) {
            throw new BadRequestError('missing client.externalId');
        }

        const chatId = await this.store.lookup(clientExternalId);
        if (chatId === null) {
            LogEngine.warn('Pager reply for a client without a chat mapping', { clientExternalId });
            throw new BadRequestError('unknown client.externalId (no mapping yet)');
        }

        const message = event.message;
        const rawText = message?.text;
        const text = typeof rawText === 'string' ? rawText.trim() : '';
        const urls = extractAttachmentUrls(message?.attachments);

        let lastSent: SentChatMessage | null = null;

        if (text.length > 0) {
            for (const chunk of splitMessageText(text)) {
                lastSent = await this.sender.sendText(chatId, chunk);
            }
        }

        for (const chunk of packLines(urls)) {
            lastSent = await this.sender.sendText(chatId, chunk);
        }

        if (lastSent === null) {
            LogEngine.info('Pager reply had nothing to deliver', { clientExternalId, chatId });
            return { externalMessageId: undeliveredMessageId(message?.pagerMessageId) };
        }

        LogEngine.info('Agent reply delivered to Telegram', {
            clientExternalId,
            chatId,
            messageId: lastSent.messageId,
            textLength: text.length,
            attachmentCount: urls.length
        });

        return { externalMessageId: deliveredMessageId(chatId, lastSent.messageId) };
    }
}
