/**
 * Message Content Extractor Utility
 *
 * Normalizes the text of an incoming Telegram message. Photos and documents
 * sent with a description arrive as media messages with a caption, not as text
 * messages, so the caption stands in for the text.
 *
 * @since 2025
 */

import type { Message, User } from 'telegraf/types';

/**
 * Returns the message text, falling back to the caption, or '' when neither is present.
 */
export function getMessageText(message: Message): string {
    if ('text' in message && message.text) {
        return message.text;
    }

    if ('caption' in message && message.caption) {
        return message.caption;
    }

    return '';
}

/**
 * True when a text message opens with a bot command entity such as /start.
 */
export function isBotCommand(message: Message): boolean {
    if (!('text' in message) || !message.entities) {
        return false;
    }
    return message.entities.some((entity) => entity.type === 'bot_command' && entity.offset === 0);
}

/**
 * "first last", trimmed; undefined when the user has no usable name.
 */
export function getDisplayName(user: User): string | undefined {
    const name = `${user.first_name} ${user.last_name ?? ''}`.trim();
    return name.length > 0 ? name : undefined;
}

/**
 * Gets message type information for debug logging
 */
export function getMessageTypeInfo(message: Message): { type: string; hasText: boolean; hasCaption: boolean } {
    const hasText = 'text' in message && !!message.text;
    const hasCaption = 'caption' in message && !!message.caption;

    let type = 'other';
    if ('photo' in message) {type = 'photo';}
    else if ('document' in message) {type = 'document';}
    else if ('video' in message) {type = 'video';}
    else if ('voice' in message) {type = 'voice';}
    else if ('sticker' in message) {type = 'sticker';}
    else if (hasText) {type = 'text';}

    return { type, hasText, hasCaption };
}
