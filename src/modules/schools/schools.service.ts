import { store } from '@/database/store.js';
import type { School } from '@/database/schema.js';
import { AppError, UniqueViolationError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';
import type { CreateSchoolInput, UpdateSchoolInput, ListSchoolsQuery } from './schools.schema.js';

function nameTaken(name: string): AppError {
  return new AppError(
    'A school with this name already exists',
    409,
    true,
    ErrorCodes.SCHOOL_NAME_TAKEN,
    { name }
  );
}

export async function createSchool(input: CreateSchoolInput): Promise<School> {
  try {
    return await store.schools.create(input);
  } catch (error) {
    if (error instanceof UniqueViolationError) {
      throw nameTaken(input.name);
    }
    throw error;
  }
}

export async function getSchoolById(id: string): Promise<School | null> {
  return store.schools.findById(id);
}

export async function listSchools(query: ListSchoolsQuery = {}): Promise<School[]> {
  return store.schools.findMany(query);
}

/**
 * Schools offered on the registration form.
 */
export async function listActiveSchools(): Promise<School[]> {
  return store.schools.findMany({ isActive: true });
}

export async function updateSchool(id: string, input: UpdateSchoolInput): Promise<School> {
  try {
    const school = await store.schools.update(id, input);
    if (!school) {
      throw new AppError('School not found', 404, true, ErrorCodes.NOT_FOUND);
    }
    return school;
  } catch (error) {
    if (error instanceof UniqueViolationError && input.name) {
      throw nameTaken(input.name);
    }
    throw error;
  }
}

// ============================================================================
// Legacy School Backfill
// ============================================================================

export interface SchoolBackfillResult {
  scanned: number;
  linked: number;
  schoolsCreated: string[];
  dryRun: boolean;
}

/**
 * Links registrations that only carry a free-text school name to a School row,
 * creating the school when no row of that name exists. Safe to re-run: linked
 * registrations are no longer selected.
 */
export async function backfillSchoolReferences(
  options: { dryRun?: boolean } = {}
): Promise<SchoolBackfillResult> {
  const dryRun = options.dryRun ?? false;
  const pending = await store.registrations.findWithoutSchool();
  const created = new Set<string>();
  let linked = 0;

  for (const registration of pending) {
    const name = registration.legacySchoolName?.trim();
    if (!name) continue;

    if (dryRun) {
      const existing = await store.schools.findByName(name);
      if (!existing) created.add(name);
      linked++;
      continue;
    }

    await store.transaction(async (tx) => {
      let school = await tx.schools.findByName(name);
      if (!school) {
        school = await tx.schools.create({ name });
        created.add(name);
      }
      await tx.registrations.update(registration.id, { schoolId: school.id });
    });
    linked++;

    logger.debug(
      { registrationNumber: registration.registrationNumber, school: name },
      'Linked registration to school'
    );
  }

  return { scanned: pending.length, linked, schoolsCreated: [...created], dryRun };
}
