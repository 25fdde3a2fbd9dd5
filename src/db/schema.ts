// Database schema for the crystal ledger and card profiles
// Supports both SQLite (sql.js, default) and PostgreSQL

export const schema = `
-- Users table: identity plus the three crystal counters and claim timestamps
CREATE TABLE IF NOT EXISTS users (
  user_id INTEGER PRIMARY KEY,
  username TEXT,
  first_name TEXT,
  language TEXT DEFAULT 'en',
  joined_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  daily_crystals INTEGER DEFAULT 0,
  weekly_crystals INTEGER DEFAULT 0,
  monthly_crystals INTEGER DEFAULT 0,
  daily_claim TEXT,
  weekly_claim TEXT,
  monthly_claim TEXT,
  first_logged INTEGER DEFAULT 0
);

-- Groups the bot has been added to
CREATE TABLE IF NOT EXISTS groups (
  chat_id INTEGER PRIMARY KEY,
  title TEXT,
  added_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

-- Append-only event log
CREATE TABLE IF NOT EXISTS logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type TEXT,
  user_id INTEGER,
  chat_id INTEGER,
  details TEXT,
  timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

-- One profile row per user
CREATE TABLE IF NOT EXISTS user_profiles (
  user_id INTEGER PRIMARY KEY,
  level INTEGER DEFAULT 1,
  rank TEXT DEFAULT 'Newbie',
  badge TEXT DEFAULT 'None',
  total_collected INTEGER DEFAULT 0,
  progress INTEGER DEFAULT 0,
  balance INTEGER DEFAULT 0,
  global_position TEXT DEFAULT 'Unranked',
  FOREIGN KEY (user_id) REFERENCES users (user_id)
);

-- Additive per-rarity counters
CREATE TABLE IF NOT EXISTS user_rarities (
  user_id INTEGER,
  rarity TEXT,
  count INTEGER DEFAULT 0,
  PRIMARY KEY (user_id, rarity),
  FOREIGN KEY (user_id) REFERENCES users (user_id)
);

-- Card catalog
CREATE TABLE IF NOT EXISTS waifu_cards (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT,
  anime TEXT,
  rarity TEXT,
  event TEXT,
  media_type TEXT,
  media_file TEXT,
  media_file_id TEXT,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

-- Card ownership quantities
CREATE TABLE IF NOT EXISTS user_waifus (
  user_id INTEGER,
  waifu_id INTEGER,
  amount INTEGER DEFAULT 0,
  PRIMARY KEY (user_id, waifu_id)
);
`;

// PostgreSQL version with different syntax
// Telegram ids exceed 32 bits, so ids are BIGINT; timestamps are ISO text like SQLite's.
// No foreign keys: SQLite leaves them unenforced, and profiles may precede users
export const schemaPostgres = `
CREATE TABLE IF NOT EXISTS users (
  user_id BIGINT PRIMARY KEY,
  username TEXT,
  first_name TEXT,
  language TEXT DEFAULT 'en',
  joined_at TEXT,
  daily_crystals INTEGER DEFAULT 0,
  weekly_crystals INTEGER DEFAULT 0,
  monthly_crystals INTEGER DEFAULT 0,
  daily_claim TEXT,
  weekly_claim TEXT,
  monthly_claim TEXT,
  first_logged INTEGER DEFAULT 0
);

CREATE TABLE IF NOT EXISTS groups (
  chat_id BIGINT PRIMARY KEY,
  title TEXT,
  added_at TEXT
);

CREATE TABLE IF NOT EXISTS logs (
  id SERIAL PRIMARY KEY,
  event_type TEXT,
  user_id BIGINT,
  chat_id BIGINT,
  details TEXT,
  timestamp TEXT
);

CREATE TABLE IF NOT EXISTS user_profiles (
  user_id BIGINT PRIMARY KEY,
  level INTEGER DEFAULT 1,
  rank TEXT DEFAULT 'Newbie',
  badge TEXT DEFAULT 'None',
  total_collected INTEGER DEFAULT 0,
  progress INTEGER DEFAULT 0,
  balance INTEGER DEFAULT 0,
  global_position TEXT DEFAULT 'Unranked'
);

CREATE TABLE IF NOT EXISTS user_rarities (
  user_id BIGINT,
  rarity TEXT,
  count INTEGER DEFAULT 0,
  PRIMARY KEY (user_id, rarity)
);

CREATE TABLE IF NOT EXISTS waifu_cards (
  id SERIAL PRIMARY KEY,
  name TEXT,
  anime TEXT,
  rarity TEXT,
  event TEXT,
  media_type TEXT,
  media_file TEXT,
  media_file_id TEXT,
  created_at TEXT
);

CREATE TABLE IF NOT EXISTS user_waifus (
  user_id BIGINT,
  waifu_id INTEGER,
  amount INTEGER DEFAULT 0,
  PRIMARY KEY (user_id, waifu_id)
);
`;

// Created after column patching, since older tables may lack the indexed columns
export const indexes = `
CREATE INDEX IF NOT EXISTS idx_logs_user ON logs(user_id);
CREATE INDEX IF NOT EXISTS idx_waifu_cards_rarity ON waifu_cards(rarity);
`;

export interface ColumnSpec {
  name: string;
  /** Definition used by ALTER TABLE ... ADD COLUMN on SQLite. */
  type: string;
  /** PostgreSQL definition, when it differs. */
  pgType?: string;
}

// Every non-key column an older database may lack, with definitions
// ADD COLUMN accepts (SQLite rejects CURRENT_TIMESTAMP defaults there)
export const patchableColumns: Record<string, ColumnSpec[]> = {
  users: [
    { name: 'username', type: 'TEXT' },
    { name: 'first_name', type: 'TEXT' },
    { name: 'language', type: "TEXT DEFAULT 'en'" },
    { name: 'joined_at', type: 'TIMESTAMP', pgType: 'TEXT' },
    { name: 'daily_crystals', type: 'INTEGER DEFAULT 0' },
    { name: 'weekly_crystals', type: 'INTEGER DEFAULT 0' },
    { name: 'monthly_crystals', type: 'INTEGER DEFAULT 0' },
    { name: 'daily_claim', type: 'TEXT' },
    { name: 'weekly_claim', type: 'TEXT' },
    { name: 'monthly_claim', type: 'TEXT' },
    { name: 'first_logged', type: 'INTEGER DEFAULT 0' },
  ],
  groups: [
    { name: 'title', type: 'TEXT' },
    { name: 'added_at', type: 'TIMESTAMP', pgType: 'TEXT' },
  ],
  logs: [
    { name: 'event_type', type: 'TEXT' },
    { name: 'user_id', type: 'INTEGER', pgType: 'BIGINT' },
    { name: 'chat_id', type: 'INTEGER', pgType: 'BIGINT' },
    { name: 'details', type: 'TEXT' },
    { name: 'timestamp', type: 'TIMESTAMP', pgType: 'TEXT' },
  ],
  user_profiles: [
    { name: 'level', type: 'INTEGER DEFAULT 1' },
    { name: 'rank', type: "TEXT DEFAULT 'Newbie'" },
    { name: 'badge', type: "TEXT DEFAULT 'None'" },
    { name: 'total_collected', type: 'INTEGER DEFAULT 0' },
    { name: 'progress', type: 'INTEGER DEFAULT 0' },
    { name: 'balance', type: 'INTEGER DEFAULT 0' },
    { name: 'global_position', type: "TEXT DEFAULT 'Unranked'" },
  ],
  user_rarities: [
    { name: 'count', type: 'INTEGER DEFAULT 0' },
  ],
  waifu_cards: [
    { name: 'name', type: 'TEXT' },
    { name: 'anime', type: 'TEXT' },
    { name: 'rarity', type: 'TEXT' },
    { name: 'event', type: 'TEXT' },
    { name: 'media_type', type: 'TEXT' },
    { name: 'media_file', type: 'TEXT' },
    { name: 'media_file_id', type: 'TEXT' },
    { name: 'created_at', type: 'TIMESTAMP', pgType: 'TEXT' },
  ],
  user_waifus: [
    { name: 'amount', type: 'INTEGER DEFAULT 0' },
  ],
};
