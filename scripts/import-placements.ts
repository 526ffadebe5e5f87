import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

import { loadConfig } from '../src/lib/config';
import { createDatabase } from '../src/lib/db/client';
import { SourcingStore } from '../src/lib/db/store';
import { importPlacements } from '../src/lib/placements/import-placements';

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: npm run placements:import -- <placements.json>');
    process.exit(1);
  }

  const filePath = path.resolve(process.cwd(), file);
  const rows = z.array(z.unknown()).parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));

  const config = loadConfig();
  const { db, sqlite } = createDatabase(config.databaseUrl);
  try {
    const { imported, rejected } = await importPlacements(new SourcingStore(db), rows);
    console.log(`\n✅ Imported ${imported} placements from ${filePath} (${rejected} rejected)`);
  } finally {
    sqlite.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Import failed:', error);
  process.exit(1);
});
