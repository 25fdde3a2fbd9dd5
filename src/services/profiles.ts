import { db as defaultDb, toNumber, type Database, type UserProfileRow } from '../db/index.js';

export interface ProfileFields {
  level: number;
  rank: string;
  badge: string;
  totalCollected: number;
  progress: number;
  balance: number;
  globalPosition: string;
}

/**
 * Fields accepted by {@link ProfileStore.upsertProfile}. Anything left out
 * is written as its default from PROFILE_DEFAULTS, not kept from the stored row.
 */
export type ProfileInput = Partial<ProfileFields>;

export interface Profile extends ProfileFields {
  userId: number;
  rarities: Record<string, number>;
}

export const PROFILE_DEFAULTS: Readonly<ProfileFields> = {
  level: 1,
  rank: 'Newbie',
  badge: 'None',
  totalCollected: 0,
  progress: 0,
  balance: 0,
  globalPosition: 'Unranked',
};

export class ProfileStore {
  constructor(private readonly database: Database = defaultDb) {}

  // Profile existence is decided by user_profiles alone
  async getProfile(userId: number): Promise<Profile | null> {
    const row = await this.database.get<UserProfileRow>(
      `SELECT user_id, level, rank, badge, total_collected, progress, balance, global_position
       FROM user_profiles WHERE user_id = ?`,
      [userId]
    );

    if (!row) {
      return null;
    }

    return {
      userId: toNumber(row.user_id),
      level: toNumber(row.level),
      rank: row.rank,
      badge: row.badge,
      totalCollected: toNumber(row.total_collected),
      progress: toNumber(row.progress),
      balance: toNumber(row.balance),
      globalPosition: row.global_position,
      rarities: await this.getRarities(userId),
    };
  }

  async getRarities(userId: number): Promise<Record<string, number>> {
    const rows = await this.database.all<{ rarity: string; count: unknown }>(
      'SELECT rarity, count FROM user_rarities WHERE user_id = ? ORDER BY rarity',
      [userId]
    );

    const rarities: Record<string, number> = {};
    for (const { rarity, count } of rows) {
      rarities[rarity] = toNumber(count);
    }
    return rarities;
  }

  /**
   * Replace the whole profile row. `fields` is merged over the defaults,
   * never over what is stored, so omitted fields reset. Read the profile
   * first when some fields must survive.
   */
  async upsertProfile(userId: number, fields: ProfileInput = {}): Promise<ProfileFields> {
    const merged: ProfileFields = {
      level: fields.level ?? PROFILE_DEFAULTS.level,
      rank: fields.rank ?? PROFILE_DEFAULTS.rank,
      badge: fields.badge ?? PROFILE_DEFAULTS.badge,
      totalCollected: fields.totalCollected ?? PROFILE_DEFAULTS.totalCollected,
      progress: fields.progress ?? PROFILE_DEFAULTS.progress,
      balance: fields.balance ?? PROFILE_DEFAULTS.balance,
      globalPosition: fields.globalPosition ?? PROFILE_DEFAULTS.globalPosition,
    };

    await this.database.run(
      `INSERT INTO user_profiles (user_id, level, rank, badge, total_collected, progress, balance, global_position)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (user_id) DO UPDATE SET
         level = excluded.level,
         rank = excluded.rank,
         badge = excluded.badge,
         total_collected = excluded.total_collected,
         progress = excluded.progress,
         balance = excluded.balance,
         global_position = excluded.global_position`,
      [
        userId,
        merged.level,
        merged.rank,
        merged.badge,
        merged.totalCollected,
        merged.progress,
        merged.balance,
        merged.globalPosition,
      ]
    );

    return merged;
  }

  // Additive: a missing row starts at `count`, an existing one grows by it
  async incrementRarity(userId: number, rarity: string, count: number = 1): Promise<number> {
    return this.database.transaction(async (tx) => {
      await tx.run(
        `INSERT INTO user_rarities (user_id, rarity, count)
         VALUES (?, ?, ?)
         ON CONFLICT (user_id, rarity) DO UPDATE SET
           count = user_rarities.count + excluded.count`,
        [userId, rarity, count]
      );

      const row = await tx.get<{ count: unknown }>(
        'SELECT count FROM user_rarities WHERE user_id = ? AND rarity = ?',
        [userId, rarity]
      );
      return toNumber(row?.count);
    });
  }

  // Owned card copies of one rarity, from the card catalog and ownership table
  async getRarityCount(userId: number, rarity: string): Promise<number> {
    const row = await this.database.get<{ total: unknown }>(
      `SELECT SUM(uw.amount) AS total FROM user_waifus uw
       JOIN waifu_cards wc ON uw.waifu_id = wc.id
       WHERE uw.user_id = ? AND wc.rarity = ?`,
      [userId, rarity]
    );
    return toNumber(row?.total);
  }
}
