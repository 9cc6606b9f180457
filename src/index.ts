/**
 * Pager Telegram Relay - Main Application Entry Point
 *
 * Bridges Telegram private chats with the Pager helpdesk. Client messages
 * received on the Telegram webhook are forwarded to Pager's custom channel;
 * agent replies pushed by Pager are delivered back into the client's chat.
 *
 * Startup order:
 * - environment and logging
 * - PostgreSQL (with retry) and the optional Redis cache
 * - Telegram bot identity and optional webhook registration
 * - HTTP server
 *
 * @since 2025
 */
import dotenv from 'dotenv';
import { LogEngine, configureLogging } from './config/logging.js';
import { validateEnvironment } from './config/env.js';
import { createBot, registerHandlers, TelegramChatSender } from './bot.js';
import { DatabaseConnection } from './database/connection.js';
import { InboundMessageHandler } from './handlers/inboundMessage.js';
import { PagerReplyHandler } from './handlers/pagerReply.js';
import { buildServer, TELEGRAM_WEBHOOK_PATH } from './server.js';
import { PostgresMappingStore, RedisMappingCache } from './services/mappingStore.js';
import { PagerClient } from './services/pager.js';
import { getErrorMessage, getErrorStack } from './utils/errorHandler.js';
import { retryConnection } from './utils/retryUtils.js';

// Nothing imported above reads the environment at load time
dotenv.config();
configureLogging();
const config = validateEnvironment();

const db = new DatabaseConnection({
    connectionString: config.database.postgresUrl,
    production: config.environment === 'production',
    sslValidate: config.database.sslValidate,
    sslCa: config.database.sslCa
});

let cache: RedisMappingCache | null = null;

try {
    await retryConnection(() => db.connect(), 'Database connection');
    LogEngine.info('Database initialized successfully');

    if (config.database.redisUrl) {
        const redisUrl = config.database.redisUrl;
        cache = await retryConnection(() => RedisMappingCache.connect(redisUrl), 'Redis connection');
    } else {
        LogEngine.info('PLATFORM_REDIS_URL not set - chat mappings are read from PostgreSQL only');
    }
} catch (error) {
    LogEngine.error('Failed to initialize storage after all retry attempts', {
        error: getErrorMessage(error)
    });
    await db.close().catch((closeError: unknown) => {
        LogEngine.error('Failed to close database during initialization failure', {
            error: getErrorMessage(closeError)
        });
    });
    process.exit(1);
}

const store = new PostgresMappingStore(db, cache);
const pager = new PagerClient({
    inboundUrl: config.pager.inboundUrl,
    channelKey: config.pager.channelKey,
    timeoutMs: config.pager.timeoutMs
});

const bot = createBot(config.telegram.botToken);
registerHandlers(bot, new InboundMessageHandler(store, pager));

const replyHandler = new PagerReplyHandler(store, new TelegramChatSender(bot), config.pager.channelKey);
const server = await buildServer({
    bot,
    replyHandler,
    webhookSecret: config.telegram.webhookSecret
});

bot.botInfo = await bot.telegram.getMe();

if (config.telegram.webhookUrl) {
    const webhookUrl = config.telegram.webhookUrl;
    await bot.telegram.setWebhook(webhookUrl, config.telegram.webhookSecret
        ? { secret_token: config.telegram.webhookSecret }
        : {});
    LogEngine.info('Telegram webhook registered', { url: webhookUrl });
} else {
    LogEngine.info(`TG_WEBHOOK_URL not set - point the bot's webhook at ${TELEGRAM_WEBHOOK_PATH} manually`);
}

await server.listen({ host: config.server.host, port: config.server.port });

LogEngine.info('Relay initialized successfully', {
    username: bot.botInfo.username,
    botId: bot.botInfo.id,
    host: config.server.host,
    port: config.server.port,
    nodeVersion: process.version,
    platform: process.platform
});

let shuttingDown = false;

/**
 * Stops accepting requests, waits for pending Pager notifications, then
 * releases the cache and database pool.
 */
async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    LogEngine.info(`Received ${signal}, shutting down gracefully...`);

    try {
        await server.close();
        LogEngine.info('HTTP server closed');

        await pager.drain();
        LogEngine.info('Pending Pager notifications settled');

        if (cache) {
            await cache.disconnect();
        }
        await db.close();
        process.exit(0);
    } catch (error) {
        LogEngine.error('Error during shutdown', {
            error: getErrorMessage(error),
            stack: getErrorStack(error)
        });
        process.exit(1);
    }
}

process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
});

process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
});
