import {
  pgTable,
  pgEnum,
  uuid,
  varchar,
  text,
  date,
  integer,
  numeric,
  boolean,
  jsonb,
  timestamp,
  unique,
  index,
} from 'drizzle-orm/pg-core';

// ============================================================================
// Enums
// ============================================================================

export const registrationStatusEnum = pgEnum('registration_status', [
  'pending',
  'completed',
  'failed',
  'cancelled',
  'free',
]);

export const paymentStatusEnum = pgEnum('payment_status', [
  'pending',
  'completed',
  'failed',
  'cancelled',
]);

export const paymentMethodEnum = pgEnum('payment_method', ['gateway', 'free']);

// ============================================================================
// Catalog
// ============================================================================

export const workshops = pgTable('workshops', {
  id: uuid('id').defaultRandom().primaryKey(),
  name: varchar('name', { length: 200 }).notNull(),
  description: text('description').notNull().default(''),
  workshopDate: date('workshop_date', { mode: 'string' }).notNull(),
  time: varchar('time', { length: 50 }).notNull(),
  duration: varchar('duration', { length: 50 }).notNull(),
  venue: varchar('venue', { length: 300 }).notNull(),
  // Decimal string, scale 2
  fee: numeric('fee', { precision: 10, scale: 2 }).notNull().default('0.00'),
  capacity: integer('capacity').notNull().default(100),
  isActive: boolean('is_active').notNull().default(true),
  organizer: varchar('organizer', { length: 200 }).notNull().default(''),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const schools = pgTable('schools', {
  id: uuid('id').defaultRandom().primaryKey(),
  name: varchar('name', { length: 200 }).notNull().unique('schools_name_unique'),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// ============================================================================
// Registrations & Payments
// ============================================================================

export const registrations = pgTable(
  'registrations',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    registrationNumber: varchar('registration_number', { length: 20 })
      .notNull()
      .unique('registrations_registration_number_unique'),
    workshopId: uuid('workshop_id')
      .notNull()
      .references(() => workshops.id, { onDelete: 'restrict' }),
    studentName: varchar('student_name', { length: 200 }).notNull(),
    grade: integer('grade').notNull(),
    schoolId: uuid('school_id').references(() => schools.id, { onDelete: 'set null' }),
    // Free-text school from before schools were a table; read only by the backfill
    legacySchoolName: varchar('legacy_school_name', { length: 200 }),
    contactNumber: varchar('contact_number', { length: 20 }).notNull(),
    email: varchar('email', { length: 254 }).notNull(),
    paymentStatus: registrationStatusEnum('payment_status').notNull().default('pending'),
    registeredAt: timestamp('registered_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    emailWorkshopUnique: unique('registrations_email_workshop_unique').on(
      table.email,
      table.workshopId
    ),
    workshopIdx: index('registrations_workshop_idx').on(table.workshopId),
    statusIdx: index('registrations_status_idx').on(table.paymentStatus),
  })
);

export const payments = pgTable(
  'payments',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    registrationId: uuid('registration_id')
      .notNull()
      .unique('payments_registration_id_unique')
      .references(() => registrations.id, { onDelete: 'cascade' }),
    transactionId: varchar('transaction_id', { length: 100 })
      .notNull()
      .unique('payments_transaction_id_unique'),
    amount: numeric('amount', { precision: 10, scale: 2 }).notNull(),
    currency: varchar('currency', { length: 3 }).notNull().default('BDT'),
    paymentStatus: paymentStatusEnum('payment_status').notNull().default('pending'),
    paymentMethod: paymentMethodEnum('payment_method').notNull().default('gateway'),
    // Raw provider payloads, kept for reconciliation
    gatewayResponse: jsonb('gateway_response')
      .$type<Record<string, unknown>>()
      .notNull()
      .default({}),
    initiatedAt: timestamp('initiated_at', { withTimezone: true }).notNull().defaultNow(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    statusIdx: index('payments_status_idx').on(table.paymentStatus),
  })
);

// ============================================================================
// Administration
// ============================================================================

export const users = pgTable('users', {
  // Firebase uid
  id: varchar('id', { length: 128 }).primaryKey(),
  email: varchar('email', { length: 254 }).notNull().unique(),
  name: varchar('name', { length: 200 }).notNull(),
  active: boolean('active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const auditLogs = pgTable(
  'audit_logs',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    entityType: varchar('entity_type', { length: 50 }).notNull(),
    entityId: varchar('entity_id', { length: 100 }).notNull(),
    action: varchar('action', { length: 50 }).notNull(),
    changes: jsonb('changes').$type<Record<string, { old: unknown; new: unknown }>>(),
    performedBy: varchar('performed_by', { length: 128 }),
    ipAddress: varchar('ip_address', { length: 64 }),
    userAgent: text('user_agent'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    entityIdx: index('audit_logs_entity_idx').on(table.entityType, table.entityId),
  })
);

// ============================================================================
// Types
// ============================================================================

export type RegistrationStatus = (typeof registrationStatusEnum.enumValues)[number];
export type PaymentStatus = (typeof paymentStatusEnum.enumValues)[number];
export type PaymentMethod = (typeof paymentMethodEnum.enumValues)[number];

export type Workshop = typeof workshops.$inferSelect;
export type NewWorkshop = typeof workshops.$inferInsert;
export type School = typeof schools.$inferSelect;
export type NewSchool = typeof schools.$inferInsert;
export type Registration = typeof registrations.$inferSelect;
export type NewRegistration = typeof registrations.$inferInsert;
export type Payment = typeof payments.$inferSelect;
export type NewPayment = typeof payments.$inferInsert;
export type User = typeof users.$inferSelect;
export type AuditLog = typeof auditLogs.$inferSelect;
export type NewAuditLog = typeof auditLogs.$inferInsert;
