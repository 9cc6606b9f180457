/**
 * Pager Telegram Relay - Database Connection Module
 *
 * PostgreSQL connection pool for the chat mapping store, with the SSL policy
 * used on cloud hosts and automatic schema bootstrap from schema.sql.
 *
 * Key Features:
 * - One pool per process, shared by every in-flight request
 * - SSL certificate validation enabled by default in production
 * - Railway internal hosts accepted with their self-signed certificates
 * - Custom CA certificates via DATABASE_SSL_CA
 * - Schema created on first start when the mapping table is missing
 *
 * @since 2025
 */
import pkg from 'pg';
import type { Pool as PoolType, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { LogEngine } from '@wgtechlabs/log-engine';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getErrorMessage, getErrorStack } from '../utils/errorHandler.js';

const { Pool } = pkg;

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const MAPPING_TABLE = 'client_chat_mappings';

/**
 * Anything that can run a parameterized SQL statement.
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

export interface DatabaseOptions {
  connectionString: string;
  production: boolean;
  /** 'full' disables SSL, 'true' skips certificate validation, 'false' validates */
  sslValidate: string | null;
  sslCa: string | null;
  maxConnections?: number;
}

type SSLConfig = false | { rejectUnauthorized: boolean; ca?: string };

/**
 * Database Connection Class
 *
 * Handles PostgreSQL connections with SSL support and connection pooling
 */
export class DatabaseConnection implements Queryable {
  private pool: PoolType;
  private readonly options: DatabaseOptions;

  constructor(options: DatabaseOptions) {
    this.options = options;
    const sslConfig = this.getSSLConfig();

    let connectionString = options.connectionString;

    // Auto-append sslmode=disable only when completely disabling SSL
    if (sslConfig === false && !connectionString.includes('sslmode=')) {
      const separator = connectionString.includes('?') ? '&' : '?';
      connectionString += `${separator}sslmode=disable`;
      LogEngine.debug('SSL disabled - added sslmode=disable to connection string', {
        modifiedUrl: maskCredentials(connectionString),
      });
    }

    const maxConnections = options.maxConnections ?? 10;
    const poolConfig: PoolConfig = {
      connectionString,
      max: maxConnections,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    };

    if (sslConfig !== false) {
      poolConfig.ssl = sslConfig;
    }

    this.pool = new Pool(poolConfig);

    this.pool.on('error', (err: Error) => {
      LogEngine.error('Unexpected error on idle client', {
        error: err.message,
        stack: err.stack,
      });
    });

    LogEngine.info('Database connection pool initialized', {
      maxConnections,
      sslEnabled: sslConfig !== false,
      sslValidation: sslConfig === false ? 'disabled' : sslConfig.rejectUnauthorized ? 'enabled' : 'no-validation',
      provider: this.isRailwayEnvironment() ? 'Railway' : 'Unknown',
    });
  }

  /**
   * Execute a database query
   *
   * @param text - SQL query string
   * @param params - Query parameters
   */
  async query(text: string, params: unknown[] = []): Promise<QueryResult<QueryResultRow>> {
    const client: PoolClient = await this.pool.connect();
    try {
      const start = Date.now();
      const result = await client.query(text, params);
      const duration = Date.now() - start;

      LogEngine.debug('Database query executed', {
        query: text.substring(0, 100) + (text.length > 100 ? '...' : ''),
        paramCount: params.length,
        rowCount: result.rowCount,
        duration: `${duration}ms`,
      });

      return result;
    } catch (error) {
      LogEngine.error('Database query error', {
        error: getErrorMessage(error),
        query: text.substring(0, 100) + (text.length > 100 ? '...' : ''),
        paramCount: params.length,
        stack: getErrorStack(error),
      });
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Test database connection and create schema if needed
   */
  async connect(): Promise<void> {
    try {
      const result = await this.query('SELECT NOW() as current_time');
      LogEngine.info('Database connection established', {
        currentTime: result.rows[0]?.current_time,
      });

      await this.ensureSchema();
    } catch (error) {
      LogEngine.error('Failed to connect to database', {
        error: getErrorMessage(error),
        stack: getErrorStack(error),
      });
      throw error;
    }
  }

  async ensureSchema(): Promise<void> {
    const tableCheck = await this.query(
      `SELECT table_name
         FROM information_schema.tables
        WHERE table_schema = 'public'
          AND table_name = $1`,
      [MAPPING_TABLE]
    );

    if (tableCheck.rows.length === 0) {
      LogEngine.info('Database tables missing - setting up automatically...', {
        missing: [MAPPING_TABLE],
      });
      await this.initializeSchema();
      return;
    }

    LogEngine.info('Database schema verified', { tablesFound: [MAPPING_TABLE] });
  }

  /**
   * Initialize database schema from schema.sql file
   */
  async initializeSchema(): Promise<void> {
    const schemaPath = path.join(__dirname, 'schema.sql');

    try {
      await fs.promises.access(schemaPath, fs.constants.F_OK);
    } catch {
      throw new Error(`Schema file not found: ${schemaPath}`);
    }

    const schema = await fs.promises.readFile(schemaPath, 'utf8');
    LogEngine.debug('Schema file loaded', {
      path: schemaPath,
      size: schema.length,
    });

    await this.query(schema);
    LogEngine.info('Database schema created successfully');
  }

  /**
   * Close all connections in the pool
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      LogEngine.info('Database connection pool closed');
    } catch (error) {
      LogEngine.error('Error closing database pool', {
        error: getErrorMessage(error),
        stack: getErrorStack(error),
      });
      throw error;
    }
  }

  /**
   * Railway internal services use 'railway.internal' in their hostnames
   */
  private isRailwayEnvironment(): boolean {
    try {
      const parsedUrl = new URL(this.options.connectionString);
      return parsedUrl.hostname.toLowerCase().includes('railway.internal');
    } catch {
      return false;
    }
  }

  /**
   * Configure SSL settings based on environment
   * @returns SSL configuration object, or false to disable SSL entirely
   */
  getSSLConfig(): SSLConfig {
    const { sslValidate, production } = this.options;
    const ca = this.options.sslCa ?? undefined;

    // 'full' disables SSL entirely (local Docker with sslmode=disable)
    if (sslValidate === 'full') {
      return false;
    }

    // Railway uses self-signed certificates
    if (this.isRailwayEnvironment()) {
      return { rejectUnauthorized: false, ca };
    }

    if (production) {
      return { rejectUnauthorized: true, ca };
    }

    if (sslValidate === 'true') {
      return { rejectUnauthorized: false, ca };
    }

    return { rejectUnauthorized: true, ca };
  }
}

function maskCredentials(connectionString: string): string {
  return connectionString.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
}
