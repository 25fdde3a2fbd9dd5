import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Database, MEMORY_URL } from '../db/index.js';
import { bootstrapSchema } from '../db/bootstrap.js';
import { GroupStore } from './groups.js';
import { EventLog } from './events.js';
import { CardStore } from './cards.js';

let database: Database;

beforeEach(async () => {
  database = new Database();
  await database.init(MEMORY_URL);
  await bootstrapSchema(database);
});

afterEach(async () => {
  await database.close();
});

describe('GroupStore', () => {
  it('adds a group once and counts distinct groups', async () => {
    const groups = new GroupStore(database);

    expect(await groups.addGroup(-100, 'Test Group')).toBe(true);
    expect(await groups.addGroup(-100, 'Renamed')).toBe(false);
    expect(await groups.addGroup(-200)).toBe(true);

    expect(await groups.getTotalGroups()).toBe(2);
    expect((await groups.getGroup(-100))?.title).toBe('Test Group');
    expect(await groups.getGroup(-300)).toBeNull();
  });
});

describe('EventLog', () => {
  it('returns the newest events first', async () => {
    const events = new EventLog(database);
    await events.logEvent('start', { userId: 42 });
    await events.logEvent('claim', { userId: 42, details: 'daily' });
    await events.logEvent('group_added', { chatId: -100 });

    const recent = await events.recentEvents(2);

    expect(recent.map(e => e.event_type)).toEqual(['group_added', 'claim']);
    expect(recent[0].user_id).toBeNull();
    expect(recent[0].chat_id).toBe(-100);
    expect(recent[1].details).toBe('daily');
  });

  it('clamps the limit to at least one row', async () => {
    const events = new EventLog(database);
    await events.logEvent('one');
    await events.logEvent('two');

    expect((await events.recentEvents(0)).map(e => e.event_type)).toEqual(['two']);
  });
});

describe('CardStore', () => {
  it('returns the id of each inserted card', async () => {
    const cards = new CardStore(database);

    expect(await cards.addCard({ name: 'Card A', anime: 'Series', rarity: 'Rare' })).toBe(1);
    expect(await cards.addCard({ name: 'Card B', rarity: 'Common', mediaType: 'photo' })).toBe(2);

    const card = await cards.getCard(2);
    expect(card?.name).toBe('Card B');
    expect(card?.anime).toBeNull();
    expect(card?.media_type).toBe('photo');
    expect(await cards.getCard(99)).toBeNull();
  });

  it('adds granted copies to the owned amount', async () => {
    const cards = new CardStore(database);
    const cardId = await cards.addCard({ name: 'Card A', rarity: 'Rare' });

    expect(await cards.grantCard(42, cardId)).toBe(1);
    expect(await cards.grantCard(42, cardId, 2)).toBe(3);
  });
});
