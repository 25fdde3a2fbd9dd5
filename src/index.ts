import { db, Database } from './db/index.js';
import { bootstrapSchema } from './db/bootstrap.js';
import { LedgerStore } from './services/ledger.js';
import { ProfileStore } from './services/profiles.js';
import { GroupStore } from './services/groups.js';
import { EventLog } from './services/events.js';
import { CardStore } from './services/cards.js';

export { Database, db, initDatabase, MEMORY_URL } from './db/index.js';
export type { Executor, User, Group, LogEntry, WaifuCard } from './db/index.js';
export { bootstrapSchema, ensureColumns } from './db/bootstrap.js';
export { InvalidAmountError, InvalidCategoryError, StorageUnavailableError } from './errors.js';
export { CLAIM_CATEGORIES, isClaimCategory, parseClaimCategory } from './services/categories.js';
export type { ClaimCategory } from './services/categories.js';
export { LedgerStore, latestClaim } from './services/ledger.js';
export type { CrystalBalance, CrystalAmounts } from './services/ledger.js';
export { ProfileStore, PROFILE_DEFAULTS } from './services/profiles.js';
export type { Profile, ProfileFields, ProfileInput } from './services/profiles.js';
export { GroupStore } from './services/groups.js';
export { EventLog } from './services/events.js';
export type { EventContext } from './services/events.js';
export { CardStore } from './services/cards.js';
export type { NewCard } from './services/cards.js';

export interface Stores {
  database: Database;
  ledger: LedgerStore;
  profiles: ProfileStore;
  groups: GroupStore;
  events: EventLog;
  cards: CardStore;
}

/**
 * Open the database, bring its schema up to date and return every store
 * bound to that one handle. Any failure here is fatal: the caller should
 * not serve requests without a usable schema.
 */
export async function openStores(databaseUrl?: string, database: Database = db): Promise<Stores> {
  await database.init(databaseUrl);

  console.log(`[DB] Running migrations (${database.isPostgres() ? 'PostgreSQL' : 'SQLite'})...`);
  const added = await bootstrapSchema(database);
  console.log(`[DB] Migrations complete${added.length > 0 ? ` (${added.length} column(s) added)` : ''}`);

  return {
    database,
    ledger: new LedgerStore(database),
    profiles: new ProfileStore(database),
    groups: new GroupStore(database),
    events: new EventLog(database),
    cards: new CardStore(database),
  };
}
