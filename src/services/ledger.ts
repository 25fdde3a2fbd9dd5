import { db as defaultDb, toNumber, type Database, type Executor, type User } from '../db/index.js';
import { config } from '../config.js';
import { InvalidAmountError } from '../errors.js';
import { CLAIM_CATEGORIES, columnsFor, parseClaimCategory, type ClaimCategory } from './categories.js';

export interface CrystalBalance {
  daily: number;
  weekly: number;
  monthly: number;
  total: number;
  lastClaim: string | null;
}

export type CrystalAmounts = Partial<Record<ClaimCategory, number>>;

interface BalanceRow {
  daily_crystals: unknown;
  weekly_crystals: unknown;
  monthly_crystals: unknown;
  daily_claim: string | null;
  weekly_claim: string | null;
  monthly_claim: string | null;
}

const INSERT_USER_SQL = `
  INSERT INTO users (user_id, username, first_name, language, joined_at)
  VALUES (?, ?, ?, ?, ?)
  ON CONFLICT (user_id) DO NOTHING`;

// ISO-8601 strings order chronologically, so the greatest string wins
export function latestClaim(timestamps: Array<string | null | undefined>): string | null {
  let latest: string | null = null;
  for (const ts of timestamps) {
    if (ts && (latest === null || ts > latest)) {
      latest = ts;
    }
  }
  return latest;
}

function assertAmount(category: ClaimCategory, amount: number): number {
  if (!Number.isSafeInteger(amount)) {
    throw new InvalidAmountError(category, amount);
  }
  return amount;
}

async function insertUserIfAbsent(
  executor: Executor,
  userId: number,
  username: string | null = null,
  firstName: string | null = null
): Promise<boolean> {
  const changes = await executor.run(INSERT_USER_SQL, [
    userId,
    username,
    firstName,
    config.defaultLanguage,
    new Date().toISOString(),
  ]);
  return changes > 0;
}

export class LedgerStore {
  constructor(private readonly database: Database = defaultDb) {}

  // Create the identity row; an existing row is left untouched
  async registerUser(userId: number, username?: string | null, firstName?: string | null): Promise<boolean> {
    return insertUserIfAbsent(this.database, userId, username ?? null, firstName ?? null);
  }

  async getUser(userId: number): Promise<User | null> {
    const user = await this.database.get<User>('SELECT * FROM users WHERE user_id = ?', [userId]);
    if (!user) return null;
    return { ...user, user_id: toNumber(user.user_id) };
  }

  async accrue(userId: number, category: ClaimCategory, amount: number): Promise<void> {
    await this.accrueMany(userId, { [category]: amount });
  }

  /**
   * Add crystals to several categories at once. Keys are validated before
   * anything is written; the user row is created if missing and every
   * counter update commits together or not at all.
   */
  async accrueMany(userId: number, amounts: Record<string, number>): Promise<void> {
    const updates = Object.entries(amounts).map(([key, amount]) => {
      const category = parseClaimCategory(key);
      return { column: columnsFor(category).crystals, amount: assertAmount(category, amount) };
    });

    await this.database.transaction(async (tx) => {
      await insertUserIfAbsent(tx, userId);
      for (const { column, amount } of updates) {
        await tx.run(`UPDATE users SET ${column} = ${column} + ? WHERE user_id = ?`, [amount, userId]);
      }
    });
  }

  // Unknown users read as all zero with no claims
  async getBalance(userId: number): Promise<CrystalBalance> {
    const row = await this.database.get<BalanceRow>(
      `SELECT daily_crystals, weekly_crystals, monthly_crystals,
              daily_claim, weekly_claim, monthly_claim
       FROM users WHERE user_id = ?`,
      [userId]
    );

    if (!row) {
      return { daily: 0, weekly: 0, monthly: 0, total: 0, lastClaim: null };
    }

    const daily = toNumber(row.daily_crystals);
    const weekly = toNumber(row.weekly_crystals);
    const monthly = toNumber(row.monthly_crystals);

    return {
      daily,
      weekly,
      monthly,
      total: daily + weekly + monthly,
      lastClaim: latestClaim([row.daily_claim, row.weekly_claim, row.monthly_claim]),
    };
  }

  async getLastClaim(userId: number, category: ClaimCategory): Promise<string | null> {
    const { claim } = columnsFor(category);
    const row = await this.database.get<{ claim: string | null }>(
      `SELECT ${claim} AS claim FROM users WHERE user_id = ?`,
      [userId]
    );
    return row?.claim ?? null;
  }

  async getLastClaims(userId: number): Promise<Record<ClaimCategory, string | null>> {
    const claims: Record<ClaimCategory, string | null> = { daily: null, weekly: null, monthly: null };
    for (const category of CLAIM_CATEGORIES) {
      claims[category] = await this.getLastClaim(userId, category);
    }
    return claims;
  }

  /**
   * Overwrite the claim timestamp for one category. No ordering or cooldown
   * check happens here. Resolves to the number of rows changed: 0 when the
   * user was never registered, since no row is created.
   */
  async setLastClaim(userId: number, category: ClaimCategory, timestamp: string): Promise<number> {
    const { claim } = columnsFor(category);
    const changes = await this.database.run(
      `UPDATE users SET ${claim} = ? WHERE user_id = ?`,
      [timestamp, userId]
    );

    if (changes === 0) {
      console.warn(`[LEDGER] ${category} claim not recorded: user ${userId} is not registered`);
    }
    return changes;
  }

  async isFirstLogged(userId: number): Promise<boolean> {
    const row = await this.database.get<{ first_logged: unknown }>(
      'SELECT first_logged FROM users WHERE user_id = ?',
      [userId]
    );
    return row ? toNumber(row.first_logged) === 1 : false;
  }

  async setFirstLogged(userId: number): Promise<number> {
    return this.database.run('UPDATE users SET first_logged = 1 WHERE user_id = ?', [userId]);
  }
}
