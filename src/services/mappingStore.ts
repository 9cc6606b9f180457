/**
 * Chat Mapping Store
 *
 * Durable map from a Pager client external id (tg_user:<id>) to the Telegram
 * chat id replies are delivered to.
 *
 * Storage Layers:
 * - PostgreSQL (permanent): source of truth, one row per client
 * - Redis (optional, 24h TTL): read cache in front of PostgreSQL
 *
 * Every write is a single INSERT ... ON CONFLICT statement, so concurrent
 * upserts for the same client resolve to whichever statement commits last.
 * Upserts write the new chat id through to the cache after the database
 * write. Lookups fill the cache only where no entry exists, so a fill that
 * read an older row never replaces a newer write. Cache failures are logged
 * and treated as misses.
 */
import { createClient } from 'redis';
import { LogEngine } from '@wgtechlabs/log-engine';
import { MAPPING_TABLE, type Queryable } from '../database/connection.js';
import { getErrorMessage } from '../utils/errorHandler.js';

export interface MappingStore {
    /** Inserts or replaces the chat id for a client; resolves once persisted. */
    upsert(clientExternalId: string, chatId: number): Promise<void>;
    /** Returns the mapped chat id, or null when the client has never written in. */
    lookup(clientExternalId: string): Promise<number | null>;
}

export interface MappingCache {
    get(clientExternalId: string): Promise<number | null>;
    /** Stores the chat id, replacing any cached entry. */
    set(clientExternalId: string, chatId: number): Promise<void>;
    /** Stores the chat id only when no entry is cached. */
    fill(clientExternalId: string, chatId: number): Promise<void>;
    delete(clientExternalId: string): Promise<void>;
}

const UPSERT_SQL = `
INSERT INTO ${MAPPING_TABLE} (client_external_id, chat_id, updated_at)
VALUES ($1, $2, NOW())
ON CONFLICT (client_external_id)
DO UPDATE SET chat_id = EXCLUDED.chat_id, updated_at = NOW()`;

const LOOKUP_SQL = `SELECT chat_id FROM ${MAPPING_TABLE} WHERE client_external_id = $1`;

/**
 * Parses a stored chat id. BIGINT columns arrive from pg as strings.
 */
export function parseChatId(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) ? value : null;
    }
    if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
        const parsed = Number(value.trim());
        return Number.isSafeInteger(parsed) ? parsed : null;
    }
    return null;
}

export class PostgresMappingStore implements MappingStore {
    private readonly db: Queryable;
    private readonly cache: MappingCache | null;

    constructor(db: Queryable, cache: MappingCache | null = null) {
        this.db = db;
        this.cache = cache;
    }

    async upsert(clientExternalId: string, chatId: number): Promise<void> {
        if (!Number.isSafeInteger(chatId)) {
            throw new Error(`Invalid chat id for ${clientExternalId}: ${chatId}`);
        }

        await this.db.query(UPSERT_SQL, [clientExternalId, chatId]);

        await this.writeThrough(clientExternalId, chatId);

        LogEngine.debug('Chat mapping stored', { clientExternalId, chatId });
    }

    async lookup(clientExternalId: string): Promise<number | null> {
        const cached = await this.readCache(clientExternalId);
        if (cached !== null) {
            return cached;
        }

        const result = await this.db.query(LOOKUP_SQL, [clientExternalId]);
        const row = result.rows[0];
        if (!row) {
            return null;
        }

        const chatId = parseChatId(row.chat_id);
        if (chatId === null) {
            LogEngine.warn('Stored chat mapping has an unusable chat id', {
                clientExternalId,
                storedValue: String(row.chat_id)
            });
            return null;
        }

        await this.fillCache(clientExternalId, chatId);
        return chatId;
    }

    private async readCache(clientExternalId: string): Promise<number | null> {
        if (!this.cache) {
            return null;
        }
        try {
            return await this.cache.get(clientExternalId);
        } catch (error) {
            LogEngine.warn('Chat mapping cache read failed, falling back to PostgreSQL', {
                clientExternalId,
                error: getErrorMessage(error)
            });
            return null;
        }
    }

    private async fillCache(clientExternalId: string, chatId: number): Promise<void> {
        if (!this.cache) {
            return;
        }
        try {
            await this.cache.fill(clientExternalId, chatId);
        } catch (error) {
            LogEngine.warn('Chat mapping cache fill failed', {
                clientExternalId,
                error: getErrorMessage(error)
            });
        }
    }

    private async writeThrough(clientExternalId: string, chatId: number): Promise<void> {
        if (!this.cache) {
            return;
        }
        try {
            await this.cache.set(clientExternalId, chatId);
            return;
        } catch (error) {
            LogEngine.warn('Chat mapping cache write failed, dropping the cached entry', {
                clientExternalId,
                error: getErrorMessage(error)
            });
        }
        try {
            await this.cache.delete(clientExternalId);
        } catch (error) {
            LogEngine.warn('Failed to invalidate cached chat mapping', {
                clientExternalId,
                error: getErrorMessage(error)
            });
        }
    }
}

type RedisClient = ReturnType<typeof createClient>;

const CACHE_KEY_PREFIX = 'mapping:client:';
const CACHE_TTL_SECONDS = 24 * 60 * 60;

/**
 * Redis-backed MappingCache.
 */
export class RedisMappingCache implements MappingCache {
    private readonly client: RedisClient;
    private readonly ttlSeconds: number;

    private constructor(client: RedisClient, ttlSeconds: number) {
        this.client = client;
        this.ttlSeconds = ttlSeconds;
    }

    static async connect(url: string, ttlSeconds: number = CACHE_TTL_SECONDS): Promise<RedisMappingCache> {
        const client = createClient({ url });
        client.on('error', (error: unknown) => {
            LogEngine.error('Redis client error', { error: getErrorMessage(error) });
        });
        await client.connect();
        LogEngine.info('Redis connected for chat mapping cache');
        return new RedisMappingCache(client, ttlSeconds);
    }

    async get(clientExternalId: string): Promise<number | null> {
        const value = await this.client.get(CACHE_KEY_PREFIX + clientExternalId);
        return value === null ? null : parseChatId(value);
    }

    async set(clientExternalId: string, chatId: number): Promise<void> {
        await this.client.setEx(CACHE_KEY_PREFIX + clientExternalId, this.ttlSeconds, String(chatId));
    }

    async fill(clientExternalId: string, chatId: number): Promise<void> {
        await this.client.set(CACHE_KEY_PREFIX + clientExternalId, String(chatId), {
            EX: this.ttlSeconds,
            NX: true
        });
    }

    async delete(clientExternalId: string): Promise<void> {
        await this.client.del(CACHE_KEY_PREFIX + clientExternalId);
    }

    async disconnect(): Promise<void> {
        await this.client.quit();
        LogEngine.info('Redis chat mapping cache disconnected');
    }
}
