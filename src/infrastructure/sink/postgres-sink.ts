import { sql as drizzleSql } from 'drizzle-orm';
import type { BaseLogger } from 'pino';
import type { RequestRecord } from '../../domain/index.js';
import { ConnectionError } from '../../domain/index.js';
import type { SinkConnector, SinkState } from '../../application/sink-connector.js';
import {
  createDbClient,
  ensureSchema,
  prepareRequestLogInsert,
} from '../db/index.js';
import type { DbClient, DbClientOptions, PreparedRequestLogInsert } from '../db/index.js';
import { classifySinkError } from './classify-error.js';
import { toRowParams } from './row-mapping.js';

export type DbClientFactory = (databaseUrl: string, options: DbClientOptions) => DbClient;

export interface PostgresSinkOptions {
  databaseUrl: string;
  log: BaseLogger;
  /** Run the idempotent `request_logs` DDL on every open. */
  ensureSchema?: boolean;
  connectTimeoutSeconds?: number;
  /** Seconds `close` waits for in-flight queries before destroying the socket. */
  closeTimeoutSeconds?: number;
  createClient?: DbClientFactory;
}

/**
 * SinkConnector over a single postgres.js connection.
 *
 * disconnected → open() → connected-idle (client created, schema ensured)
 *              → connected-prepared (insert statement built)
 * close() returns to disconnected from any state.
 */
export class PostgresSinkConnector implements SinkConnector {
  private readonly databaseUrl: string;
  private readonly log: BaseLogger;
  private readonly shouldEnsureSchema: boolean;
  private readonly connectTimeoutSeconds: number;
  private readonly closeTimeoutSeconds: number;
  private readonly createClient: DbClientFactory;

  private client: DbClient | null = null;
  private insert: PreparedRequestLogInsert | null = null;
  private currentState: SinkState = 'disconnected';

  constructor(options: PostgresSinkOptions) {
    this.databaseUrl = options.databaseUrl;
    this.log = options.log;
    this.shouldEnsureSchema = options.ensureSchema ?? true;
    this.connectTimeoutSeconds = options.connectTimeoutSeconds ?? 10;
    this.closeTimeoutSeconds = options.closeTimeoutSeconds ?? 5;
    this.createClient = options.createClient ?? createDbClient;
  }

  get state(): SinkState {
    return this.currentState;
  }

  async open(): Promise<void> {
    if (this.client !== null) {
      await this.close();
    }

    try {
      // The worker owns reconnection; an idle timeout would reconnect behind its back
      const client = this.createClient(this.databaseUrl, {
        max: 1,
        connectTimeoutSeconds: this.connectTimeoutSeconds,
        idleTimeoutSeconds: 0,
      });
      this.client = client;
      this.currentState = 'connected-idle';

      if (this.shouldEnsureSchema) {
        await ensureSchema(client.sql);
      }

      this.insert = prepareRequestLogInsert(client.db);
      this.currentState = 'connected-prepared';
    } catch (err: unknown) {
      await this.close();
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(`Failed to open sink connection: ${detail}`, { cause: err });
    }
  }

  async verify(): Promise<void> {
    if (this.client === null) {
      throw new ConnectionError('Sink connection is not open');
    }

    try {
      await this.client.db.execute(drizzleSql`select 1`);
    } catch (err: unknown) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(`Sink liveness check failed: ${detail}`, { cause: err });
    }
  }

  async write(record: RequestRecord): Promise<void> {
    if (this.insert === null) {
      throw new ConnectionError('Sink write path is not prepared');
    }

    try {
      await this.insert.execute(toRowParams(record));
    } catch (err: unknown) {
      throw classifySinkError(err);
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.insert = null;
    this.currentState = 'disconnected';

    if (client === null) return;

    try {
      await client.sql.end({ timeout: this.closeTimeoutSeconds });
    } catch (err: unknown) {
      this.log.warn({ err }, 'Error while closing sink connection');
    }
  }
}
