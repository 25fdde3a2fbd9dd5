import dotenv from 'dotenv';
dotenv.config();

function parseIntOr(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isFinite(value) ? value : fallback;
}

export const config = {
  // Database
  // sqlite:<path>, sqlite::memory:, postgres:// or postgresql://
  databaseUrl: process.env.DATABASE_URL || 'sqlite:./bot.db',

  // Users
  defaultLanguage: process.env.DEFAULT_LANGUAGE || 'en',

  // Event log
  eventLogLimit: parseIntOr(process.env.EVENT_LOG_LIMIT, 20),
};

export function isPostgresUrl(url: string): boolean {
  return url.startsWith('postgresql:') || url.startsWith('postgres:');
}
