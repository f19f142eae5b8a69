// Services
export {
  submitRegistration,
  getRegistrationById,
  getRegistrationByNumber,
  getRegistrationSummary,
  toRegistrationSummary,
  listRegistrations,
  exportRegistrations,
  getReceipt,
  markRegistrationsCompleted,
  generateRegistrationNumber,
  type LedgerError,
  type SubmitRegistrationResult,
  type RegistrationSummary,
  type MarkCompletedResult,
} from './registrations.service.js';

// Schemas & Types
export {
  RegistrationSubmissionSchema,
  ListRegistrationsQuerySchema,
  ExportRegistrationsQuerySchema,
  MarkCompletedSchema,
  BANGLADESH_MOBILE_PATTERN,
  type RegistrationSubmission,
  type ListRegistrationsQuery,
  type ExportRegistrationsQuery,
  type MarkCompletedInput,
} from './registrations.schema.js';

// Routes
export { registrationsRoutes } from './registrations.routes.js';
export {
  registrationSubmissionRoutes,
  registrationsPublicRoutes,
} from './registrations.public.routes.js';
