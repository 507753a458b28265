/**
 * Replaces every collection with generated sample data.
 * Usage: npm run seed [-- --seed 42]
 */

import '@eduhub/shared/config';
import { loadLearningServiceConfig } from '../src/config/env';
import { createStore } from '../src/config/store';
import { seededRandom } from '../src/generator/random';
import { createServiceContext } from '../src/services/context';
import { SeedService } from '../src/services/seed.service';

function readSeedArg(argv: string[]): number | undefined {
  const index = argv.indexOf('--seed');
  if (index === -1 || argv[index + 1] === undefined) {
    return undefined;
  }
  const value = Number(argv[index + 1]);
  return Number.isInteger(value) ? value : undefined;
}

async function seed(): Promise<void> {
  const config = loadLearningServiceConfig();
  const store = await createStore(config);
  const seedValue = readSeedArg(process.argv.slice(2));

  try {
    const summary = await new SeedService(createServiceContext(store)).seedDatabase(
      {
        users: config.SEED_USERS,
        courses: config.SEED_COURSES,
        lessons: config.SEED_LESSONS,
        assignments: config.SEED_ASSIGNMENTS,
        enrollments: config.SEED_ENROLLMENTS,
        submissions: config.SEED_SUBMISSIONS,
      },
      seedValue === undefined ? {} : { random: seededRandom(seedValue) }
    );

    console.log(`Seeded ${store.name}:`);
    console.table(summary);
  } finally {
    await store.close();
  }
}

seed().catch((error: unknown) => {
  console.error('Seeding failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
