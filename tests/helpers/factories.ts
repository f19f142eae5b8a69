import { faker } from '@faker-js/faker';
import type {
  Payment,
  Registration,
  School,
  User,
  Workshop,
} from '@/database/schema.js';

// ============================================================================
// Workshop Factory
// ============================================================================

export function createMockWorkshop(overrides: Partial<Workshop> = {}): Workshop {
  return {
    id: faker.string.uuid(),
    name: `${faker.word.adjective()} ${faker.word.noun()} workshop`,
    description: faker.lorem.sentence(),
    workshopDate: faker.date.soon({ days: 60 }).toISOString().slice(0, 10),
    time: '10:00 AM',
    duration: '3 hours',
    venue: faker.location.streetAddress(),
    fee: '200.00',
    capacity: 50,
    isActive: true,
    organizer: faker.company.name(),
    createdAt: faker.date.past(),
    updatedAt: faker.date.recent(),
    ...overrides,
  };
}

export function createMockFreeWorkshop(overrides: Partial<Workshop> = {}): Workshop {
  return createMockWorkshop({ fee: '0.00', ...overrides });
}

// ============================================================================
// School Factory
// ============================================================================

export function createMockSchool(overrides: Partial<School> = {}): School {
  return {
    id: faker.string.uuid(),
    name: `${faker.location.city()} High School ${faker.string.alphanumeric(4)}`,
    isActive: true,
    createdAt: faker.date.past(),
    updatedAt: faker.date.recent(),
    ...overrides,
  };
}

// ============================================================================
// Registration Factory
// ============================================================================

export function createMockPhoneNumber(): string {
  return `01${faker.helpers.arrayElement(['3', '5', '7', '8', '9'])}${faker.string.numeric(8)}`;
}

export function createMockRegistration(overrides: Partial<Registration> = {}): Registration {
  return {
    id: faker.string.uuid(),
    registrationNumber: `REG-20261019-${faker.string.hexadecimal({ length: 5, casing: 'upper', prefix: '' })}`,
    workshopId: faker.string.uuid(),
    studentName: faker.person.fullName(),
    grade: faker.number.int({ min: 2, max: 12 }),
    schoolId: null,
    legacySchoolName: null,
    contactNumber: createMockPhoneNumber(),
    email: faker.internet.email().toLowerCase(),
    paymentStatus: 'pending',
    registeredAt: faker.date.recent(),
    updatedAt: faker.date.recent(),
    ...overrides,
  };
}

// ============================================================================
// Payment Factory
// ============================================================================

export function createMockPayment(overrides: Partial<Payment> = {}): Payment {
  return {
    id: faker.string.uuid(),
    registrationId: faker.string.uuid(),
    transactionId: `TXN-REG-20261019-${faker.string.hexadecimal({ length: 8, casing: 'upper', prefix: '' })}`,
    amount: '200.00',
    currency: 'BDT',
    paymentStatus: 'pending',
    paymentMethod: 'gateway',
    gatewayResponse: {},
    initiatedAt: faker.date.recent(),
    completedAt: null,
    updatedAt: faker.date.recent(),
    ...overrides,
  };
}

// ============================================================================
// User Factory
// ============================================================================

export function createMockUser(overrides: Partial<User> = {}): User {
  return {
    id: faker.string.alphanumeric(28),
    email: faker.internet.email().toLowerCase(),
    name: faker.person.fullName(),
    active: true,
    createdAt: faker.date.past(),
    ...overrides,
  };
}
