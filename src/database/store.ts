import {
  and,
  asc,
  count,
  desc,
  eq,
  ilike,
  isNull,
  isNotNull,
  ne,
  or,
  sql,
  sum,
  type SQL,
} from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { UniqueViolationError } from '@shared/errors/app-error.js';
import { db } from './client.js';
import * as schema from './schema.js';
import {
  workshops,
  schools,
  registrations,
  payments,
  users,
  auditLogs,
  type Workshop,
  type NewWorkshop,
  type School,
  type NewSchool,
  type Registration,
  type NewRegistration,
  type RegistrationStatus,
  type Payment,
  type NewPayment,
  type PaymentStatus,
  type User,
  type NewAuditLog,
} from './schema.js';

// ============================================================================
// Store Contract
// ============================================================================

export interface PageWindow {
  limit: number;
  offset: number;
}

export interface WorkshopFilter {
  isActive?: boolean;
  search?: string;
}

export interface SchoolFilter {
  isActive?: boolean;
  search?: string;
}

export interface RegistrationFilter {
  workshopId?: string;
  paymentStatus?: RegistrationStatus;
  schoolId?: string;
  grade?: number;
  search?: string;
}

export interface PaymentFilter {
  workshopId?: string;
  paymentStatus?: PaymentStatus;
  search?: string;
}

export type RegistrationDetail = Registration & {
  workshop: Workshop;
  school: School | null;
  payment: Payment | null;
};

export type PaymentDetail = Payment & {
  registration: Registration;
  workshop: Workshop;
  school: School | null;
};

export type WorkshopChanges = Partial<Omit<NewWorkshop, 'id' | 'createdAt'>>;
export type SchoolChanges = Partial<Pick<NewSchool, 'name' | 'isActive'>>;
export type RegistrationChanges = Partial<Pick<NewRegistration, 'paymentStatus' | 'schoolId'>>;
export type PaymentChanges = Partial<
  Pick<
    NewPayment,
    | 'transactionId'
    | 'amount'
    | 'currency'
    | 'paymentStatus'
    | 'gatewayResponse'
    | 'initiatedAt'
    | 'completedAt'
  >
>;

export interface PaymentUpdateGuard {
  /** Skip the write when the stored row already has this status. */
  unlessStatus?: PaymentStatus;
}

export type StatusCounts = Record<RegistrationStatus, number>;

export interface WorkshopRepository {
  create(data: NewWorkshop): Promise<Workshop>;
  findById(id: string): Promise<Workshop | null>;
  findMany(filter: WorkshopFilter, window?: PageWindow): Promise<Workshop[]>;
  count(filter: WorkshopFilter): Promise<number>;
  update(id: string, data: WorkshopChanges): Promise<Workshop | null>;
  delete(id: string): Promise<boolean>;
}

export interface SchoolRepository {
  create(data: NewSchool): Promise<School>;
  findById(id: string): Promise<School | null>;
  findByName(name: string): Promise<School | null>;
  findMany(filter: SchoolFilter): Promise<School[]>;
  update(id: string, data: SchoolChanges): Promise<School | null>;
}

export interface RegistrationRepository {
  create(data: NewRegistration): Promise<Registration>;
  findById(id: string): Promise<Registration | null>;
  findByEmailAndWorkshop(email: string, workshopId: string): Promise<Registration | null>;
  findDetailedById(id: string): Promise<RegistrationDetail | null>;
  findDetailedByNumber(registrationNumber: string): Promise<RegistrationDetail | null>;
  findManyDetailed(filter: RegistrationFilter, window?: PageWindow): Promise<RegistrationDetail[]>;
  count(filter: RegistrationFilter): Promise<number>;
  countByStatus(workshopId?: string): Promise<StatusCounts>;
  /** Registrations with no school reference but a legacy free-text name. */
  findWithoutSchool(): Promise<Registration[]>;
  update(id: string, data: RegistrationChanges): Promise<Registration | null>;
}

export interface PaymentRepository {
  create(data: NewPayment): Promise<Payment>;
  findByTransactionId(transactionId: string): Promise<Payment | null>;
  findByRegistrationId(registrationId: string): Promise<Payment | null>;
  findManyDetailed(filter: PaymentFilter, window?: PageWindow): Promise<PaymentDetail[]>;
  count(filter: PaymentFilter): Promise<number>;
  /** Pending payments whose registration is still pending, per workshop. */
  countAwaiting(workshopId: string): Promise<number>;
  /** Sum of completed payment amounts as a decimal string. */
  sumCompleted(workshopId?: string): Promise<string>;
  update(id: string, data: PaymentChanges, guard?: PaymentUpdateGuard): Promise<Payment | null>;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
}

export interface AuditLogRepository {
  create(entry: NewAuditLog): Promise<void>;
}

export interface Store {
  workshops: WorkshopRepository;
  schools: SchoolRepository;
  registrations: RegistrationRepository;
  payments: PaymentRepository;
  users: UserRepository;
  auditLogs: AuditLogRepository;
  /** Runs `work` atomically; a throw rolls every write back. */
  transaction<T>(work: (tx: Store) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
}

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, completed: 0, failed: 0, cancelled: 0, free: 0 };
}

// ============================================================================
// Postgres Implementation
// ============================================================================

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const PG_UNIQUE_VIOLATION = '23505';

function uniqueConstraintOf(error: unknown): string | null {
  let current: unknown = error;
  while (current instanceof Error) {
    if ('code' in current && current.code === PG_UNIQUE_VIOLATION) {
      return 'constraint' in current && typeof current.constraint === 'string'
        ? current.constraint
        : 'unknown';
    }
    current = current.cause;
  }
  return null;
}

async function guardUnique<T>(write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (error) {
    const constraint = uniqueConstraintOf(error);
    if (constraint) {
      throw new UniqueViolationError(constraint);
    }
    throw error;
  }
}

function first<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}

function likePattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

function workshopWhere(filter: WorkshopFilter): SQL | undefined {
  const conditions: (SQL | undefined)[] = [];
  if (filter.isActive !== undefined) conditions.push(eq(workshops.isActive, filter.isActive));
  if (filter.search) {
    const pattern = likePattern(filter.search);
    conditions.push(or(ilike(workshops.name, pattern), ilike(workshops.venue, pattern)));
  }
  return and(...conditions);
}

function registrationWhere(filter: RegistrationFilter): SQL | undefined {
  const conditions: (SQL | undefined)[] = [];
  if (filter.workshopId) conditions.push(eq(registrations.workshopId, filter.workshopId));
  if (filter.paymentStatus) conditions.push(eq(registrations.paymentStatus, filter.paymentStatus));
  if (filter.schoolId) conditions.push(eq(registrations.schoolId, filter.schoolId));
  if (filter.grade !== undefined) conditions.push(eq(registrations.grade, filter.grade));
  if (filter.search) {
    const pattern = likePattern(filter.search);
    conditions.push(
      or(
        ilike(registrations.registrationNumber, pattern),
        ilike(registrations.studentName, pattern),
        ilike(registrations.email, pattern),
        ilike(schools.name, pattern)
      )
    );
  }
  return and(...conditions);
}

function paymentWhere(filter: PaymentFilter): SQL | undefined {
  const conditions: (SQL | undefined)[] = [];
  if (filter.workshopId) conditions.push(eq(registrations.workshopId, filter.workshopId));
  if (filter.paymentStatus) conditions.push(eq(payments.paymentStatus, filter.paymentStatus));
  if (filter.search) {
    const pattern = likePattern(filter.search);
    conditions.push(
      or(
        ilike(payments.transactionId, pattern),
        ilike(registrations.registrationNumber, pattern),
        ilike(registrations.studentName, pattern)
      )
    );
  }
  return and(...conditions);
}

export function createPostgresStore(executor: Executor): Store {
  const selectRegistrationDetail = () =>
    executor
      .select({
        registration: registrations,
        workshop: workshops,
        school: schools,
        payment: payments,
      })
      .from(registrations)
      .innerJoin(workshops, eq(registrations.workshopId, workshops.id))
      .leftJoin(schools, eq(registrations.schoolId, schools.id))
      .leftJoin(payments, eq(payments.registrationId, registrations.id))
      .$dynamic();

  type RegistrationDetailRow = Awaited<ReturnType<typeof selectRegistrationDetail>>[number];

  const toRegistrationDetail = (row: RegistrationDetailRow): RegistrationDetail => ({
    ...row.registration,
    workshop: row.workshop,
    school: row.school,
    payment: row.payment,
  });

  const workshopRepository: WorkshopRepository = {
    async create(data) {
      const [workshop] = await executor.insert(workshops).values(data).returning();
      return workshop;
    },

    async findById(id) {
      return first(await executor.select().from(workshops).where(eq(workshops.id, id)));
    },

    async findMany(filter, window) {
      const query = executor
        .select()
        .from(workshops)
        .where(workshopWhere(filter))
        .orderBy(asc(workshops.workshopDate), asc(workshops.name))
        .$dynamic();
      return await (window ? query.limit(window.limit).offset(window.offset) : query);
    },

    async count(filter) {
      const [row] = await executor.select({ value: count() }).from(workshops).where(workshopWhere(filter));
      return row?.value ?? 0;
    },

    async update(id, data) {
      return first(
        await executor
          .update(workshops)
          .set({ ...data, updatedAt: new Date() })
          .where(eq(workshops.id, id))
          .returning()
      );
    },

    async delete(id) {
      const deleted = await executor
        .delete(workshops)
        .where(eq(workshops.id, id))
        .returning({ id: workshops.id });
      return deleted.length > 0;
    },
  };

  const schoolRepository: SchoolRepository = {
    async create(data) {
      return guardUnique(async () => {
        const [school] = await executor.insert(schools).values(data).returning();
        return school;
      });
    },

    async findById(id) {
      return first(await executor.select().from(schools).where(eq(schools.id, id)));
    },

    async findByName(name) {
      return first(await executor.select().from(schools).where(eq(schools.name, name)));
    },

    async findMany(filter) {
      const conditions: (SQL | undefined)[] = [];
      if (filter.isActive !== undefined) conditions.push(eq(schools.isActive, filter.isActive));
      if (filter.search) conditions.push(ilike(schools.name, likePattern(filter.search)));
      return executor
        .select()
        .from(schools)
        .where(and(...conditions))
        .orderBy(asc(schools.name));
    },

    async update(id, data) {
      return guardUnique(async () =>
        first(
          await executor
            .update(schools)
            .set({ ...data, updatedAt: new Date() })
            .where(eq(schools.id, id))
            .returning()
        )
      );
    },
  };

  const registrationRepository: RegistrationRepository = {
    async create(data) {
      return guardUnique(async () => {
        const [registration] = await executor.insert(registrations).values(data).returning();
        return registration;
      });
    },

    async findById(id) {
      return first(await executor.select().from(registrations).where(eq(registrations.id, id)));
    },

    async findByEmailAndWorkshop(email, workshopId) {
      return first(
        await executor
          .select()
          .from(registrations)
          .where(and(eq(registrations.email, email), eq(registrations.workshopId, workshopId)))
      );
    },

    async findDetailedById(id) {
      const row = first(await selectRegistrationDetail().where(eq(registrations.id, id)));
      return row ? toRegistrationDetail(row) : null;
    },

    async findDetailedByNumber(registrationNumber) {
      const row = first(
        await selectRegistrationDetail().where(eq(registrations.registrationNumber, registrationNumber))
      );
      return row ? toRegistrationDetail(row) : null;
    },

    async findManyDetailed(filter, window) {
      const query = selectRegistrationDetail()
        .where(registrationWhere(filter))
        .orderBy(desc(registrations.registeredAt));
      const rows = await (window ? query.limit(window.limit).offset(window.offset) : query);
      return rows.map(toRegistrationDetail);
    },

    async count(filter) {
      const [row] = await executor
        .select({ value: count() })
        .from(registrations)
        .leftJoin(schools, eq(registrations.schoolId, schools.id))
        .where(registrationWhere(filter));
      return row?.value ?? 0;
    },

    async countByStatus(workshopId) {
      const rows = await executor
        .select({ status: registrations.paymentStatus, value: count() })
        .from(registrations)
        .where(workshopId ? eq(registrations.workshopId, workshopId) : undefined)
        .groupBy(registrations.paymentStatus);

      const counts = emptyStatusCounts();
      for (const row of rows) {
        counts[row.status] = row.value;
      }
      return counts;
    },

    async findWithoutSchool() {
      return executor
        .select()
        .from(registrations)
        .where(
          and(
            isNull(registrations.schoolId),
            isNotNull(registrations.legacySchoolName),
            ne(registrations.legacySchoolName, '')
          )
        )
        .orderBy(asc(registrations.registeredAt));
    },

    async update(id, data) {
      return first(
        await executor
          .update(registrations)
          .set({ ...data, updatedAt: new Date() })
          .where(eq(registrations.id, id))
          .returning()
      );
    },
  };

  const paymentRepository: PaymentRepository = {
    async create(data) {
      return guardUnique(async () => {
        const [payment] = await executor.insert(payments).values(data).returning();
        return payment;
      });
    },

    async findByTransactionId(transactionId) {
      return first(
        await executor.select().from(payments).where(eq(payments.transactionId, transactionId))
      );
    },

    async findByRegistrationId(registrationId) {
      return first(
        await executor.select().from(payments).where(eq(payments.registrationId, registrationId))
      );
    },

    async findManyDetailed(filter, window) {
      const query = executor
        .select({
          payment: payments,
          registration: registrations,
          workshop: workshops,
          school: schools,
        })
        .from(payments)
        .innerJoin(registrations, eq(payments.registrationId, registrations.id))
        .innerJoin(workshops, eq(registrations.workshopId, workshops.id))
        .leftJoin(schools, eq(registrations.schoolId, schools.id))
        .where(paymentWhere(filter))
        .orderBy(desc(payments.initiatedAt))
        .$dynamic();
      const rows = await (window ? query.limit(window.limit).offset(window.offset) : query);
      return rows.map((row) => ({
        ...row.payment,
        registration: row.registration,
        workshop: row.workshop,
        school: row.school,
      }));
    },

    async count(filter) {
      const [row] = await executor
        .select({ value: count() })
        .from(payments)
        .innerJoin(registrations, eq(payments.registrationId, registrations.id))
        .where(paymentWhere(filter));
      return row?.value ?? 0;
    },

    async countAwaiting(workshopId) {
      const [row] = await executor
        .select({ value: count() })
        .from(payments)
        .innerJoin(registrations, eq(payments.registrationId, registrations.id))
        .where(
          and(
            eq(registrations.workshopId, workshopId),
            eq(registrations.paymentStatus, 'pending'),
            eq(payments.paymentStatus, 'pending')
          )
        );
      return row?.value ?? 0;
    },

    async sumCompleted(workshopId) {
      const [row] = await executor
        .select({ total: sum(payments.amount) })
        .from(payments)
        .innerJoin(registrations, eq(payments.registrationId, registrations.id))
        .where(
          and(
            eq(payments.paymentStatus, 'completed'),
            workshopId ? eq(registrations.workshopId, workshopId) : undefined
          )
        );
      return row?.total ?? '0.00';
    },

    async update(id, data, guard) {
      return guardUnique(async () =>
        first(
          await executor
            .update(payments)
            .set({ ...data, updatedAt: new Date() })
            .where(
              and(
                eq(payments.id, id),
                guard?.unlessStatus ? ne(payments.paymentStatus, guard.unlessStatus) : undefined
              )
            )
            .returning()
        )
      );
    },
  };

  return {
    workshops: workshopRepository,
    schools: schoolRepository,
    registrations: registrationRepository,
    payments: paymentRepository,
    users: {
      async findById(id) {
        return first(await executor.select().from(users).where(eq(users.id, id)));
      },
    },
    auditLogs: {
      async create(entry) {
        await executor.insert(auditLogs).values(entry);
      },
    },
    async transaction(work) {
      return executor.transaction(async (tx) => work(createPostgresStore(tx)));
    },
    async ping() {
      await executor.execute(sql`select 1`);
    },
  };
}

export const store: Store = createPostgresStore(db);
