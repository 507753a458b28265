/**
 * Prints the analytics reports as console tables.
 */

import '@eduhub/shared/config';
import { loadLearningServiceConfig } from '../src/config/env';
import { createStore } from '../src/config/store';
import { AnalyticsService } from '../src/services/analytics.service';
import { createServiceContext } from '../src/services/context';
import { DatabaseService } from '../src/services/database.service';
import { ReportService, consoleSink } from '../src/services/report.service';

async function report(): Promise<void> {
  const config = loadLearningServiceConfig();
  const store = await createStore(config);
  const ctx = createServiceContext(store);

  try {
    const info = await new DatabaseService(ctx).retrieveDatabaseInfo();
    console.log(`Database: ${info.name}`);
    console.table(info.collections);

    await new ReportService(new AnalyticsService(ctx)).printReport(consoleSink);
  } finally {
    await store.close();
  }
}

report().catch((error: unknown) => {
  console.error('Report failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
