import dotenv from 'dotenv';

dotenv.config();

import { loadConfig } from '../src/lib/config';
import { createServices } from '../src/lib/services';
import { buildPlacementProfiles } from '../src/lib/placements/build-placement-profiles';

async function main() {
  const limit = process.argv[2] ? Number.parseInt(process.argv[2], 10) : 10;
  if (!Number.isInteger(limit) || limit < 1) {
    console.error('Usage: npm run placements:profiles -- [limit]');
    process.exit(1);
  }

  console.log(`Building up to ${limit} placement profiles...`);

  const services = createServices(loadConfig());
  try {
    const created = await buildPlacementProfiles(services, limit);
    console.log(`\nCreated ${created} placement profiles`);
  } finally {
    await services.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Build failed:', error);
  process.exit(1);
});
