/**
 * Identifier schemes shared by both relay directions.
 *
 * - tg_user:<userId>                      Pager client external id
 * - tg_msg:<userId>:<chatId>:<messageId>  Pager message external id (inbound)
 * - bot:<chatId>:<messageId>              reply delivered to Telegram
 * - pager:<pagerMessageId>                reply accepted, nothing delivered
 */

const CLIENT_PREFIX = 'tg_user:';

export function clientExternalIdFromUser(userId: number): string {
    return `${CLIENT_PREFIX}${userId}`;
}

export function messageExternalId(userId: number, chatId: number, messageId: number): string {
    return `tg_msg:${userId}:${chatId}:${messageId}`;
}

export function deliveredMessageId(chatId: number, messageId: number): string {
    return `bot:${chatId}:${messageId}`;
}

/**
 * Fallback id for a reply that produced no Telegram message.
 * A missing or null pagerMessageId renders as an empty string.
 */
export function undeliveredMessageId(pagerMessageId: unknown): string {
    if (typeof pagerMessageId === 'string' || typeof pagerMessageId === 'number') {
        return `pager:${pagerMessageId}`;
    }
    return 'pager:';
}
