import { randomUUID } from 'crypto';
import { UniqueViolationError } from '@shared/errors/app-error.js';
import { addAmounts } from '@shared/utils/money.js';
import type {
  PaymentDetail,
  PaymentFilter,
  PageWindow,
  RegistrationDetail,
  RegistrationFilter,
  StatusCounts,
  Store,
  WorkshopFilter,
} from '@/database/store.js';
import type {
  AuditLog,
  Payment,
  Registration,
  School,
  User,
  Workshop,
} from '@/database/schema.js';

/**
 * In-process stand-in for the Postgres store. Enforces the same unique
 * constraints (reported under the same names) and rolls a transaction back
 * by restoring a snapshot when its work throws.
 */

interface Tables {
  workshops: Map<string, Workshop>;
  schools: Map<string, School>;
  registrations: Map<string, Registration>;
  payments: Map<string, Payment>;
  users: Map<string, User>;
  auditLogs: AuditLog[];
}

function emptyTables(): Tables {
  return {
    workshops: new Map(),
    schools: new Map(),
    registrations: new Map(),
    payments: new Map(),
    users: new Map(),
    auditLogs: [],
  };
}

// Local copy: this module is loaded while the real store module is being mocked
function emptyStatusCounts(): StatusCounts {
  return { pending: 0, completed: 0, failed: 0, cancelled: 0, free: 0 };
}

function contains(value: string | null | undefined, search: string): boolean {
  return (value ?? '').toLowerCase().includes(search.toLowerCase());
}

function page<T>(rows: T[], window?: PageWindow): T[] {
  return window ? rows.slice(window.offset, window.offset + window.limit) : rows;
}

export interface MemoryStore extends Store {
  readonly tables: Tables;
  reset(): void;
  addUser(user: User): void;
}

export function createMemoryStore(): MemoryStore {
  let tables = emptyTables();

  const findUnique = <T>(rows: Map<string, T>, match: (row: T) => boolean, except?: string) => {
    for (const [id, row] of rows) {
      if (id !== except && match(row)) return row;
    }
    return undefined;
  };

  const registrationDetail = (registration: Registration): RegistrationDetail => {
    const workshop = tables.workshops.get(registration.workshopId);
    if (!workshop) {
      throw new Error(`Workshop ${registration.workshopId} missing`);
    }
    return {
      ...registration,
      workshop,
      school: registration.schoolId ? (tables.schools.get(registration.schoolId) ?? null) : null,
      payment:
        findUnique(tables.payments, (p) => p.registrationId === registration.id) ?? null,
    };
  };

  const matchesRegistration = (detail: RegistrationDetail, filter: RegistrationFilter) =>
    (!filter.workshopId || detail.workshopId === filter.workshopId) &&
    (!filter.paymentStatus || detail.paymentStatus === filter.paymentStatus) &&
    (!filter.schoolId || detail.schoolId === filter.schoolId) &&
    (filter.grade === undefined || detail.grade === filter.grade) &&
    (!filter.search ||
      contains(detail.registrationNumber, filter.search) ||
      contains(detail.studentName, filter.search) ||
      contains(detail.email, filter.search) ||
      contains(detail.school?.name, filter.search));

  const matchesWorkshop = (workshop: Workshop, filter: WorkshopFilter) =>
    (filter.isActive === undefined || workshop.isActive === filter.isActive) &&
    (!filter.search ||
      contains(workshop.name, filter.search) ||
      contains(workshop.venue, filter.search));

  const paymentDetails = (filter: PaymentFilter): PaymentDetail[] =>
    [...tables.payments.values()]
      .map((payment) => {
        const registration = tables.registrations.get(payment.registrationId);
        if (!registration) throw new Error(`Registration ${payment.registrationId} missing`);
        const detail = registrationDetail(registration);
        return {
          ...payment,
          registration,
          workshop: detail.workshop,
          school: detail.school,
        };
      })
      .filter(
        (p) =>
          (!filter.workshopId || p.registration.workshopId === filter.workshopId) &&
          (!filter.paymentStatus || p.paymentStatus === filter.paymentStatus) &&
          (!filter.search ||
            contains(p.transactionId, filter.search) ||
            contains(p.registration.registrationNumber, filter.search) ||
            contains(p.registration.studentName, filter.search))
      )
      .sort((a, b) => b.initiatedAt.getTime() - a.initiatedAt.getTime());

  const registrationDetails = (filter: RegistrationFilter): RegistrationDetail[] =>
    [...tables.registrations.values()]
      .map(registrationDetail)
      .filter((detail) => matchesRegistration(detail, filter))
      .sort((a, b) => b.registeredAt.getTime() - a.registeredAt.getTime());

  const checkPaymentUnique = (payment: Payment) => {
    if (findUnique(tables.payments, (p) => p.registrationId === payment.registrationId, payment.id)) {
      throw new UniqueViolationError('payments_registration_id_unique');
    }
    if (findUnique(tables.payments, (p) => p.transactionId === payment.transactionId, payment.id)) {
      throw new UniqueViolationError('payments_transaction_id_unique');
    }
  };

  const memory: MemoryStore = {
    get tables() {
      return tables;
    },

    reset() {
      tables = emptyTables();
    },

    addUser(user) {
      tables.users.set(user.id, user);
    },

    workshops: {
      async create(data) {
        const now = new Date();
        const workshop: Workshop = {
          id: data.id ?? randomUUID(),
          name: data.name,
          description: data.description ?? '',
          workshopDate: data.workshopDate,
          time: data.time,
          duration: data.duration,
          venue: data.venue,
          fee: data.fee ?? '0.00',
          capacity: data.capacity ?? 100,
          isActive: data.isActive ?? true,
          organizer: data.organizer ?? '',
          createdAt: data.createdAt ?? now,
          updatedAt: data.updatedAt ?? now,
        };
        tables.workshops.set(workshop.id, workshop);
        return workshop;
      },

      async findById(id) {
        return tables.workshops.get(id) ?? null;
      },

      async findMany(filter, window) {
        const rows = [...tables.workshops.values()]
          .filter((workshop) => matchesWorkshop(workshop, filter))
          .sort(
            (a, b) =>
              a.workshopDate.localeCompare(b.workshopDate) || a.name.localeCompare(b.name)
          );
        return page(rows, window);
      },

      async count(filter) {
        return [...tables.workshops.values()].filter((workshop) => matchesWorkshop(workshop, filter))
          .length;
      },

      async update(id, data) {
        const existing = tables.workshops.get(id);
        if (!existing) return null;
        const updated: Workshop = Object.assign({}, existing, data, { updatedAt: new Date() });
        tables.workshops.set(id, updated);
        return updated;
      },

      async delete(id) {
        return tables.workshops.delete(id);
      },
    },

    schools: {
      async create(data) {
        if (findUnique(tables.schools, (s) => s.name === data.name)) {
          throw new UniqueViolationError('schools_name_unique');
        }
        const now = new Date();
        const school: School = {
          id: data.id ?? randomUUID(),
          name: data.name,
          isActive: data.isActive ?? true,
          createdAt: data.createdAt ?? now,
          updatedAt: data.updatedAt ?? now,
        };
        tables.schools.set(school.id, school);
        return school;
      },

      async findById(id) {
        return tables.schools.get(id) ?? null;
      },

      async findByName(name) {
        return findUnique(tables.schools, (s) => s.name === name) ?? null;
      },

      async findMany(filter) {
        return [...tables.schools.values()]
          .filter(
            (school) =>
              (filter.isActive === undefined || school.isActive === filter.isActive) &&
              (!filter.search || contains(school.name, filter.search))
          )
          .sort((a, b) => a.name.localeCompare(b.name));
      },

      async update(id, data) {
        const existing = tables.schools.get(id);
        if (!existing) return null;
        const name = data.name;
        if (name !== undefined && findUnique(tables.schools, (s) => s.name === name, id)) {
          throw new UniqueViolationError('schools_name_unique');
        }
        const updated: School = Object.assign({}, existing, data, { updatedAt: new Date() });
        tables.schools.set(id, updated);
        return updated;
      },
    },

    registrations: {
      async create(data) {
        if (
          findUnique(tables.registrations, (r) => r.registrationNumber === data.registrationNumber)
        ) {
          throw new UniqueViolationError('registrations_registration_number_unique');
        }
        if (
          findUnique(
            tables.registrations,
            (r) => r.email === data.email && r.workshopId === data.workshopId
          )
        ) {
          throw new UniqueViolationError('registrations_email_workshop_unique');
        }
        const now = new Date();
        const registration: Registration = {
          id: data.id ?? randomUUID(),
          registrationNumber: data.registrationNumber,
          workshopId: data.workshopId,
          studentName: data.studentName,
          grade: data.grade,
          schoolId: data.schoolId ?? null,
          legacySchoolName: data.legacySchoolName ?? null,
          contactNumber: data.contactNumber,
          email: data.email,
          paymentStatus: data.paymentStatus ?? 'pending',
          registeredAt: data.registeredAt ?? now,
          updatedAt: data.updatedAt ?? now,
        };
        tables.registrations.set(registration.id, registration);
        return registration;
      },

      async findById(id) {
        return tables.registrations.get(id) ?? null;
      },

      async findByEmailAndWorkshop(email, workshopId) {
        return (
          findUnique(tables.registrations, (r) => r.email === email && r.workshopId === workshopId) ??
          null
        );
      },

      async findDetailedById(id) {
        const registration = tables.registrations.get(id);
        return registration ? registrationDetail(registration) : null;
      },

      async findDetailedByNumber(registrationNumber) {
        const registration = findUnique(
          tables.registrations,
          (r) => r.registrationNumber === registrationNumber
        );
        return registration ? registrationDetail(registration) : null;
      },

      async findManyDetailed(filter, window) {
        return page(registrationDetails(filter), window);
      },

      async count(filter) {
        return registrationDetails(filter).length;
      },

      async countByStatus(workshopId) {
        const counts = emptyStatusCounts();
        for (const registration of tables.registrations.values()) {
          if (workshopId && registration.workshopId !== workshopId) continue;
          counts[registration.paymentStatus]++;
        }
        return counts;
      },

      async findWithoutSchool() {
        return [...tables.registrations.values()]
          .filter((r) => r.schoolId === null && r.legacySchoolName !== null && r.legacySchoolName !== '')
          .sort((a, b) => a.registeredAt.getTime() - b.registeredAt.getTime());
      },

      async update(id, data) {
        const existing = tables.registrations.get(id);
        if (!existing) return null;
        const updated: Registration = Object.assign({}, existing, data, { updatedAt: new Date() });
        tables.registrations.set(id, updated);
        return updated;
      },
    },

    payments: {
      async create(data) {
        const now = new Date();
        const payment: Payment = {
          id: data.id ?? randomUUID(),
          registrationId: data.registrationId,
          transactionId: data.transactionId,
          amount: data.amount,
          currency: data.currency ?? 'BDT',
          paymentStatus: data.paymentStatus ?? 'pending',
          paymentMethod: data.paymentMethod ?? 'gateway',
          gatewayResponse: data.gatewayResponse ?? {},
          initiatedAt: data.initiatedAt ?? now,
          completedAt: data.completedAt ?? null,
          updatedAt: data.updatedAt ?? now,
        };
        checkPaymentUnique(payment);
        tables.payments.set(payment.id, payment);
        return payment;
      },

      async findByTransactionId(transactionId) {
        return findUnique(tables.payments, (p) => p.transactionId === transactionId) ?? null;
      },

      async findByRegistrationId(registrationId) {
        return findUnique(tables.payments, (p) => p.registrationId === registrationId) ?? null;
      },

      async findManyDetailed(filter, window) {
        return page(paymentDetails(filter), window);
      },

      async count(filter) {
        return paymentDetails(filter).length;
      },

      async countAwaiting(workshopId) {
        return paymentDetails({ workshopId, paymentStatus: 'pending' }).filter(
          (p) => p.registration.paymentStatus === 'pending'
        ).length;
      },

      async sumCompleted(workshopId) {
        return paymentDetails({ workshopId, paymentStatus: 'completed' }).reduce(
          (total, p) => addAmounts(total, p.amount),
          '0.00'
        );
      },

      async update(id, data, guard) {
        const existing = tables.payments.get(id);
        if (!existing) return null;
        if (guard?.unlessStatus && existing.paymentStatus === guard.unlessStatus) return null;
        const updated: Payment = Object.assign({}, existing, data, { updatedAt: new Date() });
        checkPaymentUnique(updated);
        tables.payments.set(id, updated);
        return updated;
      },
    },

    users: {
      async findById(id) {
        return tables.users.get(id) ?? null;
      },
    },

    auditLogs: {
      async create(entry) {
        tables.auditLogs.push({
          id: entry.id ?? randomUUID(),
          entityType: entry.entityType,
          entityId: entry.entityId,
          action: entry.action,
          changes: entry.changes ?? null,
          performedBy: entry.performedBy ?? null,
          ipAddress: entry.ipAddress ?? null,
          userAgent: entry.userAgent ?? null,
          createdAt: entry.createdAt ?? new Date(),
        });
      },
    },

    async transaction(work) {
      const snapshot = structuredClone(tables);
      try {
        return await work(memory);
      } catch (error) {
        tables = snapshot;
        throw error;
      }
    },

    async ping() {},
  };

  return memory;
}

export const memoryStore = createMemoryStore();
