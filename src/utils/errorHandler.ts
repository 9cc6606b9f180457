/**
 * Relay Error Handling
 *
 * Error classes shared by the HTTP surface, the Telegram bot and the startup
 * code, plus helpers that classify Telegram Bot API failures.
 *
 * Error Categories:
 * - HTTP errors: surfaced to the caller of a webhook with a status code
 * - Delivery errors: a reply that did not reach the Telegram chat
 * - Configuration errors: missing or malformed environment at startup
 *
 * @since 2025
 */
import type { TelegramError } from '../types/index.js';

/**
 * Base class for errors that map onto an HTTP response.
 */
export class HttpError extends Error {
    public readonly statusCode: number;
    public readonly headers: Record<string, string>;

    constructor(statusCode: number, message: string, headers: Record<string, string> = {}) {
        super(message);
        this.name = 'HttpError';
        this.statusCode = statusCode;
        this.headers = headers;
    }
}

export class BadRequestError extends HttpError {
    constructor(message: string) {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

export class UnauthorizedError extends HttpError {
    constructor(message: string) {
        super(401, message);
        this.name = 'UnauthorizedError';
    }
}

/**
 * A reply could not be delivered to the Telegram chat.
 *
 * Rate limiting maps to 503 with a Retry-After header so the helpdesk can
 * retry later; every other Telegram failure maps to 502.
 */
export class ChatDeliveryError extends HttpError {
    public readonly chatId: number;
    public readonly retryAfter: number | undefined;
    public readonly telegramErrorCode: number | undefined;

    constructor(chatId: number, cause: unknown) {
        const details = describeTelegramError(cause);
        const retryAfter = details.errorCode === 429 ? details.retryAfter : undefined;
        const headers: Record<string, string> = retryAfter !== undefined
            ? { 'retry-after': String(retryAfter) }
            : {};

        super(
            details.errorCode === 429 ? 503 : 502,
            `telegram delivery failed: ${details.description}`,
            headers
        );
        this.name = 'ChatDeliveryError';
        this.chatId = chatId;
        this.retryAfter = retryAfter;
        this.telegramErrorCode = details.errorCode;
        this.cause = cause;
    }
}

export class ConfigurationError extends Error {
    public readonly variables: string[];

    constructor(message: string, variables: string[] = []) {
        super(message);
        this.name = 'ConfigurationError';
        this.variables = variables;
    }
}

export interface TelegramErrorDetails {
    errorCode: number | undefined;
    description: string;
    retryAfter: number | undefined;
}

function isTelegramError(error: unknown): error is TelegramError {
    if (!(error instanceof Error) || !('response' in error)) {
        return false;
    }
    const response = error.response;
    return typeof response === 'object'
        && response !== null
        && 'error_code' in response
        && typeof response.error_code === 'number'
        && 'description' in response
        && typeof response.description === 'string';
}

/**
 * Extracts the Bot API error code, description and retry hint from a failure.
 */
export function describeTelegramError(error: unknown): TelegramErrorDetails {
    if (isTelegramError(error) && error.response) {
        return {
            errorCode: error.response.error_code,
            description: error.response.description,
            retryAfter: error.response.parameters?.retry_after
        };
    }

    return {
        errorCode: undefined,
        description: getErrorMessage(error),
        retryAfter: undefined
    };
}

/**
 * True when the user blocked the bot or the chat no longer exists.
 */
export function isUnreachableChatError(error: unknown): boolean {
    const { errorCode, description } = describeTelegramError(error);
    if (errorCode === 403 && description.includes('bot was blocked by the user')) {
        return true;
    }
    return (errorCode === 400 || errorCode === 403) && description.includes('chat not found');
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function getErrorStack(error: unknown): string | undefined {
    return error instanceof Error ? error.stack : undefined;
}
