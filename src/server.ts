/**
 * HTTP Surface
 *
 * Routes:
 * - GET  /                  liveness, {ok: true}
 * - GET  /health            {status: "up"}
 * - POST /telegram/webhook  Telegram updates; always answered with 200 {ok: true}
 * - POST /pager/outbound    agent replies from Pager, authenticated by x-channel-key
 *
 * Errors leave the server as {detail: string}.
 *
 * @since 2025
 */
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type { Telegraf } from 'telegraf';
import type { Update } from 'telegraf/types';
import { z } from 'zod';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { PagerReplyHandler } from './handlers/pagerReply.js';
import { HttpError, getErrorMessage, getErrorStack } from './utils/errorHandler.js';
import { secretsMatch } from './utils/secrets.js';

export const TELEGRAM_WEBHOOK_PATH = '/telegram/webhook';
export const PAGER_OUTBOUND_PATH = '/pager/outbound';

const TELEGRAM_SECRET_HEADER = 'x-telegram-bot-api-secret-token';
const CHANNEL_KEY_HEADER = 'x-channel-key';

const ACK = { ok: true } as const;

const updateSchema = z.object({
    update_id: z.number().int()
}).passthrough();

function isUpdate(value: unknown): value is Update {
    return updateSchema.safeParse(value).success;
}

function headerValue(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

export interface ServerOptions {
    bot: Telegraf;
    replyHandler: PagerReplyHandler;
    webhookSecret: string | null;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
    const { bot, replyHandler, webhookSecret } = options;

    const app = Fastify({
        logger: false
    });

    app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
        LogEngine.debug('HTTP request completed', {
            method: request.method,
            url: request.url,
            statusCode: reply.statusCode,
            responseTimeMs: Math.round(reply.elapsedTime)
        });
    });

    app.setErrorHandler(async (error, request, reply) => {
        if (error instanceof HttpError) {
            return reply.code(error.statusCode).headers(error.headers).send({ detail: error.message });
        }

        // Body parsing and routing errors raised by Fastify itself
        if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
            return reply.code(error.statusCode).send({ detail: error.message });
        }

        LogEngine.error('Unhandled error while serving request', {
            method: request.method,
            url: request.url,
            error: getErrorMessage(error),
            stack: getErrorStack(error)
        });
        return reply.code(500).send({ detail: 'internal error' });
    });

    app.get('/', async () => ACK);

    app.get('/health', async () => ({ status: 'up' as const }));

    // Telegram retries every update it does not see acknowledged, so this scope
    // takes any body as text and never answers with an error.
    await app.register(async (scope) => {
        scope.removeAllContentTypeParsers();
        scope.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
            done(null, body);
        });

        scope.setErrorHandler(async (error, _request, reply) => {
            LogEngine.error('Telegram webhook request failed', {
                error: getErrorMessage(error),
                stack: getErrorStack(error)
            });
            return reply.code(200).send(ACK);
        });

        scope.post(TELEGRAM_WEBHOOK_PATH, async (request: FastifyRequest) => {
            if (webhookSecret !== null) {
                const provided = headerValue(request.headers[TELEGRAM_SECRET_HEADER]);
                if (!secretsMatch(provided, webhookSecret)) {
                    LogEngine.warn('Telegram webhook request with a bad secret token', {
                        tokenPresent: provided !== undefined
                    });
                    return ACK;
                }
            }

            const raw = typeof request.body === 'string' ? request.body : '';
            let payload: unknown;
            try {
                payload = JSON.parse(raw);
            } catch (error) {
                LogEngine.warn('Telegram webhook body is not valid JSON', {
                    error: getErrorMessage(error),
                    length: raw.length
                });
                return ACK;
            }

            if (!isUpdate(payload)) {
                LogEngine.warn('Telegram webhook body is not an update');
                return ACK;
            }

            try {
                await bot.handleUpdate(payload);
            } catch (error) {
                LogEngine.error('Failed to process Telegram update', {
                    updateId: payload.update_id,
                    error: getErrorMessage(error),
                    stack: getErrorStack(error)
                });
            }
            return ACK;
        });
    });

    app.post(PAGER_OUTBOUND_PATH, {
        onRequest: async (request: FastifyRequest) => {
            replyHandler.authenticate(headerValue(request.headers[CHANNEL_KEY_HEADER]));
        }
    }, async (request: FastifyRequest) => replyHandler.handle(request.body));

    return app;
}
