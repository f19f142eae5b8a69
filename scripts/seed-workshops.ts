/// <reference types="node" />
/**
 * Seeds the workshop catalog and school list from scripts/data/workshops.json.
 * Existing schools (matched by name) are left alone; workshops are inserted
 * only when the table is empty.
 *
 * Run with: npx tsx scripts/seed-workshops.ts
 */
import 'dotenv/config';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { store } from '../src/database/store.js';
import { closeDatabase } from '../src/database/client.js';
import { CreateWorkshopSchema } from '../src/modules/workshops/workshops.schema.js';

const SeedFileSchema = z.object({
  schools: z.array(z.string().trim().min(1)),
  workshops: z.array(CreateWorkshopSchema),
});

async function main() {
  const raw = await readFile(new URL('./data/workshops.json', import.meta.url), 'utf8');
  const seed = SeedFileSchema.parse(JSON.parse(raw));

  let schoolsCreated = 0;
  for (const name of seed.schools) {
    if (await store.schools.findByName(name)) continue;
    await store.schools.create({ name });
    schoolsCreated++;
  }
  console.log(`Schools: ${schoolsCreated} created, ${seed.schools.length - schoolsCreated} existing`);

  const existing = await store.workshops.count({});
  if (existing > 0) {
    console.log(`Workshops: skipped (${existing} already present)`);
    return;
  }

  for (const workshop of seed.workshops) {
    await store.workshops.create(workshop);
    console.log(`  + ${workshop.name} (${workshop.workshopDate})`);
  }
  console.log(`Workshops: ${seed.workshops.length} created`);
}

main()
  .catch((error) => {
    console.error('Seed failed:', error);
    process.exitCode = 1;
  })
  .finally(() => closeDatabase());
