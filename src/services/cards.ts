import { db as defaultDb, toNumber, type Database, type WaifuCard } from '../db/index.js';

export interface NewCard {
  name: string;
  anime?: string | null;
  rarity: string;
  event?: string | null;
  mediaType?: string | null;
  mediaFile?: string | null;
  mediaFileId?: string | null;
}

export class CardStore {
  constructor(private readonly database: Database = defaultDb) {}

  async addCard(card: NewCard): Promise<number> {
    const row = await this.database.transaction(async (tx) => tx.get<{ id: unknown }>(
      `INSERT INTO waifu_cards (name, anime, rarity, event, media_type, media_file, media_file_id, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       RETURNING id`,
      [
        card.name,
        card.anime ?? null,
        card.rarity,
        card.event ?? null,
        card.mediaType ?? null,
        card.mediaFile ?? null,
        card.mediaFileId ?? null,
        new Date().toISOString(),
      ]
    ));
    return toNumber(row?.id);
  }

  async getCard(cardId: number): Promise<WaifuCard | null> {
    const card = await this.database.get<WaifuCard>('SELECT * FROM waifu_cards WHERE id = ?', [cardId]);
    return card ? { ...card, id: toNumber(card.id) } : null;
  }

  // Additive like rarity counts; resolves to the new owned amount
  async grantCard(userId: number, cardId: number, amount: number = 1): Promise<number> {
    return this.database.transaction(async (tx) => {
      await tx.run(
        `INSERT INTO user_waifus (user_id, waifu_id, amount)
         VALUES (?, ?, ?)
         ON CONFLICT (user_id, waifu_id) DO UPDATE SET
           amount = user_waifus.amount + excluded.amount`,
        [userId, cardId, amount]
      );

      const row = await tx.get<{ amount: unknown }>(
        'SELECT amount FROM user_waifus WHERE user_id = ? AND waifu_id = ?',
        [userId, cardId]
      );
      return toNumber(row?.amount);
    });
  }
}
