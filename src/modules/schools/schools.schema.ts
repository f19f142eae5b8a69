import { z } from 'zod';

export const CreateSchoolSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    isActive: z.boolean().default(true),
  })
  .strict();

export const UpdateSchoolSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    isActive: z.boolean().optional(),
  })
  .strict()
  .refine((data) => data.name !== undefined || data.isActive !== undefined, {
    message: 'At least one field must be provided for update',
  });

export const ListSchoolsQuerySchema = z
  .object({
    isActive: z
      .enum(['true', 'false'])
      .transform((value) => value === 'true')
      .optional(),
    search: z.string().max(200).optional(),
  })
  .strict();

export const SchoolIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

export type CreateSchoolInput = z.infer<typeof CreateSchoolSchema>;
export type UpdateSchoolInput = z.infer<typeof UpdateSchoolSchema>;
export type ListSchoolsQuery = z.infer<typeof ListSchoolsQuerySchema>;
