import { db as defaultDb, toNumber, type Database, type Group } from '../db/index.js';

export class GroupStore {
  constructor(private readonly database: Database = defaultDb) {}

  // Returns false when the group was already known
  async addGroup(chatId: number, title: string | null = null): Promise<boolean> {
    const changes = await this.database.run(
      `INSERT INTO groups (chat_id, title, added_at)
       VALUES (?, ?, ?)
       ON CONFLICT (chat_id) DO NOTHING`,
      [chatId, title, new Date().toISOString()]
    );
    return changes > 0;
  }

  async getGroup(chatId: number): Promise<Group | null> {
    const group = await this.database.get<Group>('SELECT * FROM groups WHERE chat_id = ?', [chatId]);
    return group ? { ...group, chat_id: toNumber(group.chat_id) } : null;
  }

  async getTotalGroups(): Promise<number> {
    const row = await this.database.get<{ total: unknown }>('SELECT COUNT(*) AS total FROM groups');
    return toNumber(row?.total);
  }
}
