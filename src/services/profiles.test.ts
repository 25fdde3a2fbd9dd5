import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Database, MEMORY_URL } from '../db/index.js';
import { bootstrapSchema } from '../db/bootstrap.js';
import { CardStore } from './cards.js';
import { PROFILE_DEFAULTS, ProfileStore } from './profiles.js';

let database: Database;
let profiles: ProfileStore;

beforeEach(async () => {
  database = new Database();
  await database.init(MEMORY_URL);
  await bootstrapSchema(database);
  profiles = new ProfileStore(database);
});

afterEach(async () => {
  await database.close();
});

describe('ProfileStore.upsertProfile', () => {
  it('fills omitted fields with defaults', async () => {
    await profiles.upsertProfile(42, { level: 5 });

    expect(await profiles.getProfile(42)).toEqual({
      userId: 42,
      level: 5,
      rank: 'Newbie',
      badge: 'None',
      totalCollected: 0,
      progress: 0,
      balance: 0,
      globalPosition: 'Unranked',
      rarities: {},
    });
  });

  it('resets fields left out of a later upsert instead of keeping them', async () => {
    await profiles.upsertProfile(42, { level: 3, rank: 'Veteran', badge: 'Gold', balance: 120 });
    await profiles.upsertProfile(42, { level: 5 });

    const profile = await profiles.getProfile(42);
    expect(profile?.level).toBe(5);
    expect(profile?.rank).toBe('Newbie');
    expect(profile?.badge).toBe('None');
    expect(profile?.balance).toBe(0);
  });

  it('returns the row it wrote', async () => {
    const written = await profiles.upsertProfile(42, { globalPosition: '#12', progress: 40 });

    expect(written).toEqual({ ...PROFILE_DEFAULTS, globalPosition: '#12', progress: 40 });
  });

  it('gives the same result when repeated with identical input', async () => {
    const fields = { level: 7, rank: 'Collector', totalCollected: 33 };
    await profiles.upsertProfile(42, fields);
    const first = await profiles.getProfile(42);
    await profiles.upsertProfile(42, fields);

    expect(await profiles.getProfile(42)).toEqual(first);
  });
});

describe('ProfileStore.getProfile', () => {
  it('returns null for a user without a profile row', async () => {
    expect(await profiles.getProfile(42)).toBeNull();
  });

  it('stays null when only rarity rows exist', async () => {
    await profiles.incrementRarity(42, 'Rare');

    expect(await profiles.getProfile(42)).toBeNull();
  });

  it('includes every rarity count for the user', async () => {
    await profiles.upsertProfile(42);
    await profiles.incrementRarity(42, 'Legendary');
    await profiles.incrementRarity(42, 'Common', 2);
    await profiles.incrementRarity(7, 'Common', 9);

    const profile = await profiles.getProfile(42);
    expect(profile?.rarities).toEqual({ Common: 2, Legendary: 1 });
  });
});

describe('ProfileStore.incrementRarity', () => {
  it('accumulates repeated increments', async () => {
    await profiles.incrementRarity(42, 'Legendary', 1);
    await profiles.incrementRarity(42, 'Legendary', 1);
    const count = await profiles.incrementRarity(42, 'Legendary', 1);

    expect(count).toBe(3);
    expect(await profiles.getRarities(42)).toEqual({ Legendary: 3 });
  });

  it('starts a new pair at the supplied amount', async () => {
    expect(await profiles.incrementRarity(42, 'Epic', 4)).toBe(4);
  });

  it('passes negative amounts through arithmetically', async () => {
    await profiles.incrementRarity(42, 'Rare', 5);

    expect(await profiles.incrementRarity(42, 'Rare', -2)).toBe(3);
  });
});

describe('ProfileStore.getRarityCount', () => {
  it('returns 0 when the user owns no card of that rarity', async () => {
    expect(await profiles.getRarityCount(42, 'Legendary')).toBe(0);
  });

  it('sums owned amounts across cards of the rarity', async () => {
    const cards = new CardStore(database);
    const common = await cards.addCard({ name: 'Card A', rarity: 'Common' });
    const legendaryOne = await cards.addCard({ name: 'Card B', rarity: 'Legendary' });
    const legendaryTwo = await cards.addCard({ name: 'Card C', rarity: 'Legendary' });

    await cards.grantCard(42, legendaryOne, 2);
    await cards.grantCard(42, legendaryTwo);
    await cards.grantCard(42, common);
    await cards.grantCard(99, legendaryOne, 5);

    expect(await profiles.getRarityCount(42, 'Legendary')).toBe(3);
    expect(await profiles.getRarityCount(42, 'Common')).toBe(1);
    expect(await profiles.getRarityCount(42, 'Mythic')).toBe(0);
  });
});
