import { config, isPostgresUrl } from '../config.js';
import { StorageUnavailableError } from '../errors.js';
import initSqlJs, { Database as SqlJsDatabase, SqlJsStatic } from 'sql.js';
import pg from 'pg';
import fs from 'fs';

export type DbRow = Record<string, unknown>;
export type SqlParam = string | number | null;

export const MEMORY_URL = 'sqlite::memory:';

/**
 * The query surface shared by the database handle and by the scoped
 * executor handed to a transaction callback. Placeholders are always `?`.
 */
export interface Executor {
  /** Returns the number of rows the statement changed. */
  run(sql: string, params?: SqlParam[]): Promise<number>;
  get<T = DbRow>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  all<T = DbRow>(sql: string, params?: SqlParam[]): Promise<T[]>;
}

// ============== SQLite Adapter ==============

interface SqliteFile {
  SQL: SqlJsStatic;
  handle: SqlJsDatabase;
  path: string | null;
  // Last image known to be on disk; a failed write restores from it
  image: Uint8Array | null;
}

async function openSqlite(databaseUrl: string): Promise<SqliteFile> {
  const SQL = await initSqlJs();

  if (databaseUrl === MEMORY_URL) {
    console.log('[DB] Created in-memory SQLite database');
    return { SQL, handle: new SQL.Database(), path: null, image: null };
  }

  const path = databaseUrl.startsWith('sqlite:') ? databaseUrl.replace('sqlite:', '') : databaseUrl;

  if (fs.existsSync(path)) {
    const image = new Uint8Array(fs.readFileSync(path));
    const handle = new SQL.Database(image);
    try {
      // sql.js takes any bytes; the header is only checked on first use
      handle.exec('SELECT count(*) FROM sqlite_master');
    } catch (error) {
      handle.close();
      throw error;
    }
    console.log(`[DB] Loaded existing SQLite database from ${path}`);
    return { SQL, handle, path, image };
  }

  console.log(`[DB] Created new SQLite database at ${path}`);
  const handle = new SQL.Database();
  return { SQL, handle, path, image: handle.export() };
}

function sqliteRun(handle: SqlJsDatabase, sql: string, params: SqlParam[]): number {
  handle.run(sql, params);
  return handle.getRowsModified();
}

function sqliteAll<T>(handle: SqlJsDatabase, sql: string, params: SqlParam[], limit?: number): T[] {
  const results: T[] = [];
  const stmt = handle.prepare(sql);
  try {
    stmt.bind(params);
    while (stmt.step()) {
      results.push(stmt.getAsObject() as T);
      if (limit !== undefined && results.length >= limit) break;
    }
  } finally {
    stmt.free();
  }
  return results;
}

function sqliteExecutor(handle: SqlJsDatabase): Executor {
  return {
    async run(sql: string, params: SqlParam[] = []) {
      return sqliteRun(handle, sql, params);
    },
    async get<T>(sql: string, params: SqlParam[] = []) {
      return sqliteAll<T>(handle, sql, params, 1)[0];
    },
    async all<T>(sql: string, params: SqlParam[] = []) {
      return sqliteAll<T>(handle, sql, params);
    },
  };
}

// ============== PostgreSQL Setup ==============

function createPgPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    console.error('[DB] PostgreSQL pool error:', err);
  });

  console.log('[DB] PostgreSQL pool initialized');
  return pool;
}

// Convert ? placeholders to $1, $2, etc. for PostgreSQL
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', '57P01']);

// Socket failures, SQLSTATE class 08 and admin shutdown; constraint and
// syntax errors are the caller's and pass through unchanged
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && typeof error.code === 'string') {
    return CONNECTION_ERROR_CODES.has(error.code) || error.code.startsWith('08');
  }
  return /connection terminated|timeout exceeded when trying to connect/i.test(error.message);
}

export function toStorageError(error: unknown): unknown {
  if (!isConnectionError(error)) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new StorageUnavailableError(`PostgreSQL unavailable: ${reason}`, { cause: error });
}

export type PgQuery = (text: string, values: SqlParam[]) => Promise<pg.QueryResult>;

export function pgExecutor(query: PgQuery): Executor {
  const send = async (sql: string, params: SqlParam[]): Promise<pg.QueryResult> => {
    try {
      return await query(convertPlaceholders(sql), params);
    } catch (error) {
      throw toStorageError(error);
    }
  };

  return {
    async run(sql: string, params: SqlParam[] = []) {
      const result = await send(sql, params);
      return result.rowCount ?? 0;
    },
    async get(sql: string, params: SqlParam[] = []) {
      const result = await send(sql, params);
      return result.rows[0];
    },
    async all(sql: string, params: SqlParam[] = []) {
      const result = await send(sql, params);
      return result.rows;
    },
  };
}

// ============== Unified Database Interface ==============

export class Database implements Executor {
  private SQL: SqlJsStatic | null = null;
  private sqliteDb: SqlJsDatabase | null = null;
  private sqlitePath: string | null = null;
  private sqliteImage: Uint8Array | null = null;
  private pgPool: pg.Pool | null = null;
  private _isPostgres: boolean = false;
  // sql.js has one connection; every SQLite call waits its turn here so a
  // transaction never picks up statements from another caller
  private queue: Promise<void> = Promise.resolve();
  private opening: Promise<void> | null = null;

  // Concurrent callers share one open; a failed open can be retried
  init(databaseUrl: string = config.databaseUrl): Promise<void> {
    if (!this.opening) {
      this.opening = this.open(databaseUrl).catch((error: unknown) => {
        this.opening = null;
        throw error;
      });
    }
    return this.opening;
  }

  private async open(databaseUrl: string): Promise<void> {
    this._isPostgres = isPostgresUrl(databaseUrl);

    try {
      if (this._isPostgres) {
        console.log('[DB] Using PostgreSQL database');
        const pool = createPgPool(databaseUrl);
        try {
          await pool.query('SELECT 1');
        } catch (error) {
          await pool.end();
          throw error;
        }
        this.pgPool = pool;
        console.log('[DB] PostgreSQL connection successful');
      } else {
        console.log('[DB] Using SQLite database');
        const { SQL, handle, path, image } = await openSqlite(databaseUrl);
        this.SQL = SQL;
        this.sqliteDb = handle;
        this.sqlitePath = path;
        this.sqliteImage = image;
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageUnavailableError(`Unable to open database: ${reason}`, { cause: error });
    }

    console.log('[DB] Database initialized');
  }

  isPostgres(): boolean {
    return this._isPostgres;
  }

  async run(sql: string, params: SqlParam[] = []): Promise<number> {
    if (this._isPostgres) {
      return this.pgPoolExecutor().run(sql, params);
    }
    return this.serialize(async () => {
      const handle = this.requireSqlite();
      const changes = sqliteRun(handle, sql, params);
      this.persist(handle);
      return changes;
    });
  }

  async get<T = DbRow>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    if (this._isPostgres) {
      return this.pgPoolExecutor().get<T>(sql, params);
    }
    return this.serialize(async () => sqliteAll<T>(this.requireSqlite(), sql, params, 1)[0]);
  }

  async all<T = DbRow>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    if (this._isPostgres) {
      return this.pgPoolExecutor().all<T>(sql, params);
    }
    return this.serialize(async () => sqliteAll<T>(this.requireSqlite(), sql, params));
  }

  // Multi-statement script, no parameters
  async exec(sql: string): Promise<void> {
    if (this._isPostgres) {
      const pool = this.requirePg();
      try {
        await pool.query(sql);
      } catch (error) {
        throw toStorageError(error);
      }
      return;
    }
    await this.serialize(async () => {
      const handle = this.requireSqlite();
      handle.exec(sql);
      this.persist(handle);
    });
  }

  async transaction<T>(fn: (tx: Executor) => Promise<T>): Promise<T> {
    if (this._isPostgres) {
      const client = await this.connectPg();

      let broken: Error | undefined;
      try {
        const tx = pgExecutor((text, values) => client.query(text, values));
        await tx.run('BEGIN');
        const result = await fn(tx);
        try {
          await client.query('COMMIT');
        } catch (error) {
          throw new StorageUnavailableError('Failed to commit transaction', { cause: error });
        }
        return result;
      } catch (error) {
        broken = await rollbackClient(client);
        if (!broken && error instanceof StorageUnavailableError) {
          broken = error;
        }
        throw error;
      } finally {
        // a client passed an error is destroyed instead of going back to the pool
        client.release(broken);
      }
    }

    return this.serialize(async () => {
      const handle = this.requireSqlite();
      handle.run('BEGIN TRANSACTION');
      let result: T;
      try {
        result = await fn(sqliteExecutor(handle));
      } catch (error) {
        rollbackQuietly(handle);
        throw error;
      }
      try {
        handle.run('COMMIT');
      } catch (error) {
        rollbackQuietly(handle);
        throw new StorageUnavailableError('Failed to commit transaction', { cause: error });
      }
      this.persist(handle);
      return result;
    });
  }

  async close(): Promise<void> {
    if (this.pgPool) {
      await this.pgPool.end();
      this.pgPool = null;
    }
    if (this.sqliteDb) {
      await this.serialize(async () => this.sqliteDb?.close());
      this.sqliteDb = null;
      this.sqlitePath = null;
      this.sqliteImage = null;
      this.SQL = null;
    }
    this._isPostgres = false;
    this.opening = null;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(() => undefined, () => undefined);
    return result;
  }

  // A write the file never received is undone in memory as well
  private persist(handle: SqlJsDatabase): void {
    if (!this.sqlitePath) return;
    const image = handle.export();
    try {
      fs.writeFileSync(this.sqlitePath, Buffer.from(image));
    } catch (error) {
      this.restoreSqlite(handle);
      throw new StorageUnavailableError(`Failed to write SQLite database to ${this.sqlitePath}`, { cause: error });
    }
    this.sqliteImage = image;
  }

  private restoreSqlite(handle: SqlJsDatabase): void {
    if (!this.SQL) return;
    handle.close();
    this.sqliteDb = this.sqliteImage ? new this.SQL.Database(this.sqliteImage) : new this.SQL.Database();
    console.error(`[DB] Reverted unsaved changes to ${this.sqlitePath}`);
  }

  private async connectPg(): Promise<pg.PoolClient> {
    const pool = this.requirePg();
    try {
      return await pool.connect();
    } catch (error) {
      throw new StorageUnavailableError('Unable to acquire a PostgreSQL connection', { cause: error });
    }
  }

  private pgPoolExecutor(): Executor {
    const pool = this.requirePg();
    return pgExecutor((text, values) => pool.query(text, values));
  }

  private requireSqlite(): SqlJsDatabase {
    if (!this.sqliteDb) {
      throw new StorageUnavailableError('Database not initialized');
    }
    return this.sqliteDb;
  }

  private requirePg(): pg.Pool {
    if (!this.pgPool) {
      throw new StorageUnavailableError('Database not initialized');
    }
    return this.pgPool;
  }
}

function rollbackQuietly(handle: SqlJsDatabase): void {
  try {
    handle.run('ROLLBACK');
  } catch (error) {
    // a failed COMMIT may already have ended the transaction
    console.error('[DB] Rollback failed:', error);
  }
}

async function rollbackClient(client: pg.PoolClient): Promise<Error | undefined> {
  try {
    await client.query('ROLLBACK');
    return undefined;
  } catch (error) {
    console.error('[DB] Rollback failed:', error);
    return error instanceof Error ? error : new Error(String(error));
  }
}

export const db = new Database();

export async function initDatabase(databaseUrl?: string): Promise<void> {
  await db.init(databaseUrl);
}

// ============== Type Definitions ==============

export interface User {
  user_id: number;
  username: string | null;
  first_name: string | null;
  language: string | null;
  joined_at: string | null;
  daily_crystals: number;
  weekly_crystals: number;
  monthly_crystals: number;
  daily_claim: string | null;
  weekly_claim: string | null;
  monthly_claim: string | null;
  first_logged: number;
}

export interface Group {
  chat_id: number;
  title: string | null;
  added_at: string | null;
}

export interface LogEntry {
  id: number;
  event_type: string;
  user_id: number | null;
  chat_id: number | null;
  details: string | null;
  timestamp: string;
}

export interface UserProfileRow {
  user_id: number;
  level: number;
  rank: string;
  badge: string;
  total_collected: number;
  progress: number;
  balance: number;
  global_position: string;
}

export interface UserRarityRow {
  user_id: number;
  rarity: string;
  count: number;
}

export interface WaifuCard {
  id: number;
  name: string | null;
  anime: string | null;
  rarity: string | null;
  event: string | null;
  media_type: string | null;
  media_file: string | null;
  media_file_id: string | null;
  created_at: string | null;
}

// COUNT/SUM come back as strings from pg and as numbers from sql.js
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return 0;
}
