// Services
export {
  createWorkshop,
  getWorkshopById,
  getWorkshopDetails,
  getOpenWorkshop,
  listWorkshops,
  listOpenWorkshops,
  updateWorkshop,
  deleteWorkshop,
  getWorkshopAvailability,
  computeAvailability,
  isFreeWorkshop,
  type WorkshopAvailability,
  type WorkshopWithAvailability,
} from './workshops.service.js';

// Schemas & Types
export {
  CreateWorkshopSchema,
  UpdateWorkshopSchema,
  ListWorkshopsQuerySchema,
  WorkshopIdParamSchema,
  FeeSchema,
  type CreateWorkshopInput,
  type UpdateWorkshopInput,
  type ListWorkshopsQuery,
} from './workshops.schema.js';

// Routes
export { workshopsRoutes } from './workshops.routes.js';
export { workshopsPublicRoutes } from './workshops.public.routes.js';
