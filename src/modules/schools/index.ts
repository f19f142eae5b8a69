// Services
export {
  createSchool,
  getSchoolById,
  listSchools,
  listActiveSchools,
  updateSchool,
  backfillSchoolReferences,
  type SchoolBackfillResult,
} from './schools.service.js';

// Schemas & Types
export {
  CreateSchoolSchema,
  UpdateSchoolSchema,
  ListSchoolsQuerySchema,
  SchoolIdParamSchema,
  type CreateSchoolInput,
  type UpdateSchoolInput,
  type ListSchoolsQuery,
} from './schools.schema.js';

// Routes
export { schoolsRoutes } from './schools.routes.js';
export { schoolsPublicRoutes } from './schools.public.routes.js';
