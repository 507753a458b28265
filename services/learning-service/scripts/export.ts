/**
 * Exports every collection to a JSON file, or imports one back.
 * Usage: npm run export [-- <path>]
 *        npm run export -- --import <path>
 */

import '@eduhub/shared/config';
import { readFile } from 'fs/promises';
import { loadLearningServiceConfig } from '../src/config/env';
import { createStore } from '../src/config/store';
import { createServiceContext } from '../src/services/context';
import { ExportService } from '../src/services/export.service';

async function run(): Promise<void> {
  const config = loadLearningServiceConfig();
  const args = process.argv.slice(2);
  const importing = args[0] === '--import';
  const path = (importing ? args[1] : args[0]) ?? config.EXPORT_PATH;

  const store = await createStore(config);
  const exporter = new ExportService(createServiceContext(store));

  try {
    if (importing) {
      const payload: unknown = JSON.parse(await readFile(path, 'utf8'));
      const summary = await exporter.importSampleData(payload);
      console.log(`Imported ${path} into ${store.name}:`);
      console.table(summary);
    } else {
      const summary = await exporter.exportSampleData(path);
      console.log(`Exported ${store.name} to ${path}:`);
      console.table(summary);
    }
  } finally {
    await store.close();
  }
}

run().catch((error: unknown) => {
  console.error('Export failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
