/**
 * Pager API Service - Outbound notifications
 *
 * Forwards client messages to the Pager custom channel webhook. Delivery is
 * best effort: HTTP errors, timeouts and network failures are logged and
 * dropped, and nothing is retried.
 *
 * @since 2025
 */

import fetch from 'node-fetch';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { PagerNotification } from '../types/index.js';
import { getErrorMessage } from '../utils/errorHandler.js';

// Response bodies are logged up to this many characters
const ERROR_BODY_PREVIEW_LENGTH = 800;

export interface PagerClientOptions {
    inboundUrl: string;
    channelKey: string;
    timeoutMs: number;
}

/**
 * Accepts notifications without making the caller wait for delivery.
 */
export interface NotificationSink {
    dispatch(payload: PagerNotification): void;
}

export class PagerClient implements NotificationSink {
    private readonly options: PagerClientOptions;
    private readonly inFlight = new Set<Promise<void>>();

    constructor(options: PagerClientOptions) {
        this.options = options;
    }

    /**
     * POSTs one notification to Pager. Never rejects.
     */
    async notify(payload: PagerNotification): Promise<void> {
        const context = {
            clientExternalId: payload.client.externalId,
            messageExternalId: payload.message.externalId
        };

        try {
            const response = await fetch(this.options.inboundUrl, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'x-channel-key': this.options.channelKey
                },
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(this.options.timeoutMs)
            });

            if (response.status >= 400) {
                const errorText = await response.text();
                LogEngine.error('Pager rejected notification', {
                    ...context,
                    status: response.status,
                    body: errorText.slice(0, ERROR_BODY_PREVIEW_LENGTH)
                });
                return;
            }

            LogEngine.debug('Notification delivered to Pager', { ...context, status: response.status });
        } catch (error) {
            const timedOut = error instanceof Error
                && (error.name === 'TimeoutError' || error.name === 'AbortError');
            LogEngine.error(timedOut ? 'Pager notification timed out' : 'Pager notification failed', {
                ...context,
                timeoutMs: timedOut ? this.options.timeoutMs : undefined,
                error: getErrorMessage(error)
            });
        }
    }

    /**
     * Starts a notification in the background.
     */
    dispatch(payload: PagerNotification): void {
        const task = this.notify(payload).finally(() => {
            this.inFlight.delete(task);
        });
        this.inFlight.add(task);
    }

    /**
     * Resolves once every dispatched notification has settled.
     */
    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
    }
}
