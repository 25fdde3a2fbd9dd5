import { db as defaultDb, toNumber, type Database, type LogEntry } from '../db/index.js';
import { config } from '../config.js';

export interface EventContext {
  userId?: number | null;
  chatId?: number | null;
  details?: string | null;
}

const MAX_EVENTS = 100;

export class EventLog {
  constructor(private readonly database: Database = defaultDb) {}

  async logEvent(eventType: string, context: EventContext = {}): Promise<void> {
    await this.database.run(
      `INSERT INTO logs (event_type, user_id, chat_id, details, timestamp)
       VALUES (?, ?, ?, ?, ?)`,
      [
        eventType,
        context.userId ?? null,
        context.chatId ?? null,
        context.details ?? null,
        new Date().toISOString(),
      ]
    );
  }

  // Newest first
  async recentEvents(limit: number = config.eventLogLimit): Promise<LogEntry[]> {
    const safeLimit = Math.max(1, Math.min(MAX_EVENTS, Math.floor(limit)));
    const rows = await this.database.all<LogEntry>(
      'SELECT * FROM logs ORDER BY id DESC LIMIT ?',
      [safeLimit]
    );

    return rows.map(row => ({
      ...row,
      id: toNumber(row.id),
      user_id: row.user_id === null ? null : toNumber(row.user_id),
      chat_id: row.chat_id === null ? null : toNumber(row.chat_id),
    }));
  }
}
