import { openStores } from '../index.js';

async function seed() {
  console.log('🌱 Seeding database with test data...');

  const { database, ledger, profiles, groups, cards } = await openStores();

  const testUsers = [
    { userId: 1001, username: 'test_user_one', firstName: 'One' },
    { userId: 1002, username: 'test_user_two', firstName: 'Two' },
    { userId: 1003, username: 'test_user_three', firstName: 'Three' },
  ];

  for (const { userId, username, firstName } of testUsers) {
    await ledger.registerUser(userId, username, firstName);
    await ledger.accrueMany(userId, { daily: 10, weekly: 50 });
    await profiles.upsertProfile(userId, { level: 2, rank: 'Collector' });
  }

  const common = await cards.addCard({ name: 'Test Card A', anime: 'Test Series', rarity: 'Common' });
  const legendary = await cards.addCard({ name: 'Test Card B', anime: 'Test Series', rarity: 'Legendary' });

  await cards.grantCard(1001, common, 2);
  await cards.grantCard(1001, legendary);
  await profiles.incrementRarity(1001, 'Common', 2);
  await profiles.incrementRarity(1001, 'Legendary');

  await groups.addGroup(-1000000000001, 'Test Group');

  console.log('✅ Database seeded successfully!');
  console.log('');
  console.log('📊 Test data created:');
  console.log(`   - ${testUsers.length} test users with 10 daily + 50 weekly crystals each`);
  console.log('   - 2 cards (Common, Legendary) granted to user 1001');
  console.log('   - 1 test group');

  await database.close();
}

seed().catch(error => {
  console.error('❌ Seeding failed:', error);
  process.exit(1);
});
