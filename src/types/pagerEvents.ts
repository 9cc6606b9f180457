/**
 * Pager Wire Format
 *
 * Notifications the relay sends to Pager and the reply events Pager pushes
 * back. Reply payloads are parsed leniently: unknown fields pass through and
 * malformed attachment entries are skipped rather than rejecting the event.
 */
import { z } from 'zod';

export const PAGER_MESSAGE_CREATED = 'message.created';

// Attachments are read up to this many entries per reply
export const MAX_REPLY_ATTACHMENTS = 20;

export const pagerAttachmentSchema = z.object({
    type: z.string().nullish(),
    payload: z.object({
        url: z.string().nullish()
    }).passthrough().nullish()
}).passthrough();

export type PagerAttachment = z.infer<typeof pagerAttachmentSchema>;

export const pagerReplySchema = z.object({
    event: z.unknown(),
    client: z.object({
        externalId: z.unknown()
    }).passthrough().nullish().catch(null),
    message: z.object({
        text: z.unknown(),
        attachments: z.array(z.unknown()).nullish().catch(null),
        pagerMessageId: z.unknown()
    }).passthrough().nullish().catch(null)
}).passthrough();

export type PagerReplyPayload = z.infer<typeof pagerReplySchema>;

export interface PagerReplyResponse {
    externalMessageId: string;
}

export interface PagerNotification {
    event: typeof PAGER_MESSAGE_CREATED;
    client: {
        externalId: string;
        name?: string;
    };
    message: {
        externalId: string;
        direction: 'incoming';
        text: string;
        attachments: PagerAttachment[];
    };
}

/**
 * Collects attachment URLs from the first MAX_REPLY_ATTACHMENTS entries,
 * skipping entries without a non-empty payload.url.
 */
export function extractAttachmentUrls(attachments: readonly unknown[] | null | undefined): string[] {
    if (!attachments) {
        return [];
    }

    const urls: string[] = [];
    for (const entry of attachments.slice(0, MAX_REPLY_ATTACHMENTS)) {
        const parsed = pagerAttachmentSchema.safeParse(entry);
        if (!parsed.success) {
            continue;
        }
        const url = parsed.data.payload?.url;
        if (url) {
            urls.push(url);
        }
    }
    return urls;
}
