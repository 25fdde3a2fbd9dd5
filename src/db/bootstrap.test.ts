import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Database, MEMORY_URL } from './index.js';
import { bootstrapSchema, ensureColumns } from './bootstrap.js';
import { LedgerStore } from '../services/ledger.js';
import { EventLog } from '../services/events.js';

let database: Database;

beforeEach(async () => {
  database = new Database();
  await database.init(MEMORY_URL);
});

afterEach(async () => {
  await database.close();
});

async function columnNames(table: string): Promise<string[]> {
  const rows = await database.all<{ name: string }>(`PRAGMA table_info(${table})`);
  return rows.map(r => r.name);
}

describe('bootstrapSchema', () => {
  it('creates every table on an empty database without patching', async () => {
    expect(await bootstrapSchema(database)).toEqual([]);

    const tables = await database.all<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    );
    expect(tables.map(t => t.name)).toEqual([
      'groups',
      'logs',
      'user_profiles',
      'user_rarities',
      'user_waifus',
      'users',
      'waifu_cards',
    ]);
  });

  it('can run again without touching existing data', async () => {
    await bootstrapSchema(database);
    const ledger = new LedgerStore(database);
    await ledger.accrueMany(42, { daily: 3, monthly: 1 });
    await ledger.setLastClaim(42, 'monthly', '2024-06-01T00:00:00');

    expect(await bootstrapSchema(database)).toEqual([]);
    expect(await ledger.getBalance(42)).toEqual({
      daily: 3,
      weekly: 0,
      monthly: 1,
      total: 4,
      lastClaim: '2024-06-01T00:00:00',
    });
  });

  it('patches missing columns onto an older users table', async () => {
    await database.exec(`
      CREATE TABLE users (
        user_id INTEGER PRIMARY KEY,
        username TEXT,
        first_name TEXT,
        daily_crystals INTEGER DEFAULT 0
      );
      INSERT INTO users (user_id, username, first_name, daily_crystals) VALUES (1, 'legacy', 'Legacy', 7);
    `);

    const added = await bootstrapSchema(database);

    expect(added).toEqual([
      'users.language',
      'users.joined_at',
      'users.weekly_crystals',
      'users.monthly_crystals',
      'users.daily_claim',
      'users.weekly_claim',
      'users.monthly_claim',
      'users.first_logged',
    ]);

    const ledger = new LedgerStore(database);
    expect(await ledger.getBalance(1)).toEqual({
      daily: 7,
      weekly: 0,
      monthly: 0,
      total: 7,
      lastClaim: null,
    });
    expect(await ledger.isFirstLogged(1)).toBe(false);
    expect((await ledger.getUser(1))?.language).toBe('en');
  });

  it('patches the card catalog media columns', async () => {
    await database.exec(`
      CREATE TABLE waifu_cards (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT,
        anime TEXT,
        rarity TEXT,
        event TEXT
      );
    `);

    expect(await bootstrapSchema(database)).toEqual([
      'waifu_cards.media_type',
      'waifu_cards.media_file',
      'waifu_cards.media_file_id',
      'waifu_cards.created_at',
    ]);
  });

  it('creates indexes only after the indexed columns exist', async () => {
    await database.exec('CREATE TABLE logs (id INTEGER PRIMARY KEY AUTOINCREMENT, event_type TEXT)');

    expect(await bootstrapSchema(database)).toEqual([
      'logs.user_id',
      'logs.chat_id',
      'logs.details',
      'logs.timestamp',
    ]);

    const events = new EventLog(database);
    await events.logEvent('claim', { userId: 42 });
    const [latest] = await events.recentEvents(1);
    expect(latest.user_id).toBe(42);
  });
});

describe('ensureColumns', () => {
  it('adds only the columns that are absent', async () => {
    await database.exec('CREATE TABLE extras (id INTEGER PRIMARY KEY, note TEXT)');

    const added = await ensureColumns(database, 'extras', [
      { name: 'note', type: 'TEXT' },
      { name: 'score', type: 'INTEGER DEFAULT 0' },
    ]);

    expect(added).toEqual(['extras.score']);
    expect(await columnNames('extras')).toEqual(['id', 'note', 'score']);
    expect(await ensureColumns(database, 'extras', [{ name: 'score', type: 'INTEGER DEFAULT 0' }])).toEqual([]);
  });
});
