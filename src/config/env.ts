/**
 * Pager Telegram Relay - Environment Configuration and Validation
 *
 * Loads and validates the environment the relay needs before anything else is
 * started. Handlers receive the resulting RelayConfig explicitly; nothing below
 * src/index.ts reads process.env on its own.
 *
 * Required Environment Variables:
 * - TG_BOT_TOKEN: Telegram Bot API token (from @BotFather)
 * - PAGER_CHANNEL_KEY: shared secret of the Pager custom channel, used for
 *   notifications sent to Pager and for replies received from it
 * - POSTGRES_URL: PostgreSQL connection string for the chat mapping store
 *
 * Optional Environment Variables:
 * - PAGER_INBOUND_URL: notification endpoint (defaults to the Pager custom webhook)
 * - PAGER_TIMEOUT_MS: notification timeout in milliseconds (default 15000)
 * - PLATFORM_REDIS_URL: Redis read cache for chat mappings
 * - PORT / HOST: HTTP listener (default 8000 / 0.0.0.0)
 * - TG_WEBHOOK_URL: public https URL of /telegram/webhook, registered at startup
 * - TG_WEBHOOK_SECRET: secret token Telegram echoes on every webhook request
 * - DATABASE_SSL_VALIDATE / DATABASE_SSL_CA: PostgreSQL SSL policy
 * - NODE_ENV / LOG_LEVEL: runtime mode and log verbosity
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';
import { ConfigurationError } from '../utils/errorHandler.js';

export const DEFAULT_PAGER_INBOUND_URL = 'https://pager.co.ua/api/webhooks/custom';
export const DEFAULT_PAGER_TIMEOUT_MS = 15_000;
export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';

const REQUIRED_ENV_VARS = [
    'TG_BOT_TOKEN',
    'PAGER_CHANNEL_KEY',
    'POSTGRES_URL'
] as const;

const ENV_VAR_HELP: Record<(typeof REQUIRED_ENV_VARS)[number], string> = {
    TG_BOT_TOKEN: 'Message @BotFather on Telegram, create a bot with /newbot and copy its token',
    PAGER_CHANNEL_KEY: 'Pager dashboard → Channels → Custom channel → copy the channel key',
    POSTGRES_URL: 'PostgreSQL connection string for the chat mapping store'
};

const PLACEHOLDER_VALUES = [
    'your_token_here',
    'your_telegram_bot_token',
    'bot_token_from_botfather',
    'your_channel_key',
    'channel_key_here',
    'replace_me',
    'change_me'
];

// numeric bot id, a colon, then the secret part
const TELEGRAM_TOKEN_PATTERN = /^\d{6,10}:[A-Za-z0-9_-]{35,}$/;
const WEBHOOK_SECRET_PATTERN = /^[A-Za-z0-9_-]{1,256}$/;

export interface RelayConfig {
    telegram: {
        botToken: string;
        webhookUrl: string | null;
        webhookSecret: string | null;
    };
    pager: {
        inboundUrl: string;
        channelKey: string;
        timeoutMs: number;
    };
    database: {
        postgresUrl: string;
        redisUrl: string | null;
        sslValidate: string | null;
        sslCa: string | null;
    };
    server: {
        host: string;
        port: number;
    };
    environment: string;
}

/**
 * Builds the relay configuration from an environment map.
 *
 * @throws ConfigurationError listing every missing required variable, or
 * describing the first malformed value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
    const missing = REQUIRED_ENV_VARS.filter((name) => !normalizeString(env[name]));
    if (missing.length > 0) {
        throw new ConfigurationError(
            `Missing required environment variables: ${missing.join(', ')}`,
            [...missing]
        );
    }

    const botToken = requireValue(env, 'TG_BOT_TOKEN');
    const channelKey = requireValue(env, 'PAGER_CHANNEL_KEY');
    const postgresUrl = requireValue(env, 'POSTGRES_URL');

    rejectPlaceholder('TG_BOT_TOKEN', botToken);
    rejectPlaceholder('PAGER_CHANNEL_KEY', channelKey);

    if (!TELEGRAM_TOKEN_PATTERN.test(botToken)) {
        throw new ConfigurationError(
            'TG_BOT_TOKEN format is invalid. Expected <bot id>:<secret>, e.g. 123456789:AA...\n' +
            'Get a valid token from @BotFather on Telegram.',
            ['TG_BOT_TOKEN']
        );
    }

    return {
        telegram: {
            botToken,
            webhookUrl: parseWebhookUrl(env.TG_WEBHOOK_URL),
            webhookSecret: parseWebhookSecret(env.TG_WEBHOOK_SECRET)
        },
        pager: {
            inboundUrl: parseHttpUrl('PAGER_INBOUND_URL', env.PAGER_INBOUND_URL) ?? DEFAULT_PAGER_INBOUND_URL,
            channelKey,
            timeoutMs: parseInteger(env.PAGER_TIMEOUT_MS, DEFAULT_PAGER_TIMEOUT_MS, 1_000, 120_000)
        },
        database: {
            postgresUrl,
            redisUrl: normalizeString(env.PLATFORM_REDIS_URL),
            sslValidate: normalizeString(env.DATABASE_SSL_VALIDATE),
            sslCa: normalizeString(env.DATABASE_SSL_CA)
        },
        server: {
            host: normalizeString(env.HOST) ?? DEFAULT_HOST,
            port: parsePort(env.PORT)
        },
        environment: normalizeString(env.NODE_ENV) ?? 'development'
    };
}

/**
 * Validates the environment before startup and returns the configuration.
 *
 * Logs what is missing together with setup hints and terminates the process
 * when the configuration is unusable.
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): RelayConfig {
    try {
        const config = loadConfig(env);
        LogEngine.info('✅ Environment configuration validated successfully');
        LogEngine.info(`🚀 Running in ${config.environment} mode`);
        return config;
    } catch (error) {
        if (!(error instanceof ConfigurationError)) {
            throw error;
        }

        LogEngine.error('❌ Environment configuration error:', {
            error: error.message,
            variables: error.variables
        });
        for (const name of error.variables) {
            if (isRequiredVar(name)) {
                LogEngine.error(`   ❌ ${name}`);
                LogEngine.error(`      How to get: ${ENV_VAR_HELP[name]}`);
            }
        }
        LogEngine.error('\n📝 Copy .env.example to .env, fill in the values and restart the relay.');
        process.exit(1);
    }
}

function isRequiredVar(name: string): name is (typeof REQUIRED_ENV_VARS)[number] {
    return REQUIRED_ENV_VARS.some((required) => required === name);
}

function requireValue(env: NodeJS.ProcessEnv, name: (typeof REQUIRED_ENV_VARS)[number]): string {
    const value = normalizeString(env[name]);
    if (!value) {
        throw new ConfigurationError(`${name} is required`, [name]);
    }
    return value;
}

function rejectPlaceholder(name: string, value: string): void {
    const lower = value.toLowerCase();
    if (PLACEHOLDER_VALUES.some((placeholder) => lower.includes(placeholder))) {
        throw new ConfigurationError(
            `${name} contains placeholder values. Please replace with actual credentials.`,
            [name]
        );
    }
}

function normalizeString(value: string | undefined | null): string | null {
    if (typeof value !== 'string') {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

function parseHttpUrl(name: string, value: string | undefined): string | null {
    const raw = normalizeString(value);
    if (!raw) {
        return null;
    }
    let parsed: URL;
    try {
        parsed = new URL(raw);
    } catch {
        throw new ConfigurationError(`${name} is not a valid URL`, [name]);
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
        throw new ConfigurationError(`${name} must be an http(s) URL`, [name]);
    }
    return raw;
}

function parseWebhookUrl(value: string | undefined): string | null {
    const url = parseHttpUrl('TG_WEBHOOK_URL', value);
    if (url && !url.startsWith('https://')) {
        throw new ConfigurationError('TG_WEBHOOK_URL must start with https://', ['TG_WEBHOOK_URL']);
    }
    return url;
}

function parseWebhookSecret(value: string | undefined): string | null {
    const secret = normalizeString(value);
    if (secret && !WEBHOOK_SECRET_PATTERN.test(secret)) {
        throw new ConfigurationError(
            'TG_WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and - (1-256 characters)',
            ['TG_WEBHOOK_SECRET']
        );
    }
    return secret;
}

function parsePort(value: string | undefined): number {
    const raw = normalizeString(value);
    if (!raw) {
        return DEFAULT_PORT;
    }
    const port = Number(raw);
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
        throw new ConfigurationError(`PORT must be an integer between 1 and 65535, got "${raw}"`, ['PORT']);
    }
    return port;
}

function parseInteger(raw: string | undefined, fallback: number, min: number, max: number): number {
    if (typeof raw !== 'string') {
        return fallback;
    }
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed)) {
        return fallback;
    }
    return Math.min(max, Math.max(min, parsed));
}
