import { describe, it, expect } from 'vitest';
import { memoryStore } from '../../../tests/mocks/store.js';
import {
  createMockRegistration,
  createMockSchool,
  createMockWorkshop,
} from '../../../tests/helpers/factories.js';
import {
  backfillSchoolReferences,
  createSchool,
  getSchoolById,
  listActiveSchools,
  updateSchool,
} from './schools.service.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

describe('Schools Service', () => {
  describe('createSchool / updateSchool', () => {
    it('should reject a duplicate name with 409', async () => {
      await createSchool({ name: 'Lakeside High School', isActive: true });

      await expect(
        createSchool({ name: 'Lakeside High School', isActive: true })
      ).rejects.toMatchObject({
        statusCode: 409,
        code: ErrorCodes.SCHOOL_NAME_TAKEN,
        details: { name: 'Lakeside High School' },
      });
    });

    it('should reject renaming onto an existing name', async () => {
      await createSchool({ name: 'Lakeside High School', isActive: true });
      const other = await createSchool({ name: 'Riverside School', isActive: true });

      await expect(
        updateSchool(other.id, { name: 'Lakeside High School' })
      ).rejects.toMatchObject({ code: ErrorCodes.SCHOOL_NAME_TAKEN });
    });

    it('should throw 404 for a missing school', async () => {
      await expect(
        updateSchool('00000000-0000-4000-8000-000000000000', { isActive: false })
      ).rejects.toMatchObject({ statusCode: 404 });
    });
  });

  describe('listActiveSchools', () => {
    it('should list active schools by name', async () => {
      await memoryStore.schools.create(createMockSchool({ name: 'Zeta Academy' }));
      await memoryStore.schools.create(createMockSchool({ name: 'Alpha School' }));
      await memoryStore.schools.create(createMockSchool({ name: 'Closed School', isActive: false }));

      const schools = await listActiveSchools();

      expect(schools.map((s) => s.name)).toEqual(['Alpha School', 'Zeta Academy']);
    });
  });

  describe('backfillSchoolReferences', () => {
    async function seedLegacy() {
      const workshop = await memoryStore.workshops.create(createMockWorkshop());
      const existing = await memoryStore.schools.create(
        createMockSchool({ name: 'Lakeside High School' })
      );
      const a = await memoryStore.registrations.create(
        createMockRegistration({ workshopId: workshop.id, legacySchoolName: 'Lakeside High School' })
      );
      const b = await memoryStore.registrations.create(
        createMockRegistration({ workshopId: workshop.id, legacySchoolName: '  Hillview School ' })
      );
      const c = await memoryStore.registrations.create(
        createMockRegistration({ workshopId: workshop.id, legacySchoolName: 'Hillview School' })
      );
      return { existing, a, b, c };
    }

    it('should link registrations and create missing schools once', async () => {
      const { existing, a, b, c } = await seedLegacy();

      const result = await backfillSchoolReferences();

      expect(result).toEqual({
        scanned: 3,
        linked: 3,
        schoolsCreated: ['Hillview School'],
        dryRun: false,
      });

      const hillview = await memoryStore.schools.findByName('Hillview School');
      expect((await memoryStore.registrations.findById(a.id))?.schoolId).toBe(existing.id);
      expect((await memoryStore.registrations.findById(b.id))?.schoolId).toBe(hillview?.id);
      expect((await memoryStore.registrations.findById(c.id))?.schoolId).toBe(hillview?.id);
    });

    it('should be a no-op on a second run', async () => {
      await seedLegacy();
      await backfillSchoolReferences();

      const result = await backfillSchoolReferences();

      expect(result.scanned).toBe(0);
      expect(result.linked).toBe(0);
    });

    it('should report without writing in dry-run mode', async () => {
      const { b } = await seedLegacy();

      const result = await backfillSchoolReferences({ dryRun: true });

      expect(result).toEqual({
        scanned: 3,
        linked: 3,
        schoolsCreated: ['Hillview School'],
        dryRun: true,
      });
      expect(await memoryStore.schools.findByName('Hillview School')).toBeNull();
      expect((await memoryStore.registrations.findById(b.id))?.schoolId).toBeNull();
    });
  });

  describe('getSchoolById', () => {
    it('should return the school or null', async () => {
      const school = await createSchool({ name: 'Lakeside High School', isActive: true });

      expect(await getSchoolById(school.id)).toMatchObject({ name: 'Lakeside High School' });
      expect(await getSchoolById('00000000-0000-4000-8000-000000000000')).toBeNull();
    });
  });
});
