/// <reference types="node" />
/**
 * Migration Script: link registrations that only carry a free-text school
 * name to a row in the schools table.
 *
 * Run with: npx tsx scripts/backfill-schools.ts
 * Dry run:  npx tsx scripts/backfill-schools.ts --dry-run
 */
import 'dotenv/config';
import { backfillSchoolReferences } from '../src/modules/schools/schools.service.js';
import { closeDatabase } from '../src/database/client.js';

async function main() {
  const isDryRun = process.argv.includes('--dry-run');

  console.log('='.repeat(60));
  console.log('Migration: Backfill school references');
  console.log(`Mode: ${isDryRun ? 'DRY RUN (no changes will be made)' : 'LIVE'}`);
  console.log('='.repeat(60));
  console.log('');

  const result = await backfillSchoolReferences({ dryRun: isDryRun });

  console.log(`Registrations without a school: ${result.scanned}`);
  console.log(`${isDryRun ? 'Would link' : 'Linked'}: ${result.linked}`);
  if (result.schoolsCreated.length > 0) {
    console.log(`${isDryRun ? 'Would create' : 'Created'} ${result.schoolsCreated.length} school(s):`);
    for (const name of result.schoolsCreated) {
      console.log(`  - ${name}`);
    }
  }

  if (isDryRun) {
    console.log('\nThis was a dry run. Run without --dry-run to apply changes.');
  }
}

main()
  .catch((error) => {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  })
  .finally(() => closeDatabase());
