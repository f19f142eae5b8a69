import type { PaymentDetail, RegistrationDetail } from '@/database/store.js';
import {
  PAYMENT_METHOD_LABELS,
  REGISTRATION_STATUS_LABELS,
} from '@shared/constants/status-labels.js';
import { formatDateTime, schoolNameOf } from '@shared/utils/format.js';
import { formatAmount, isZeroAmount } from '@shared/utils/money.js';
import type { SpreadsheetColumn } from './spreadsheet.service.js';

export const REGISTRATION_EXPORT_COLUMNS: SpreadsheetColumn<RegistrationDetail>[] = [
  { header: 'Registration Number', value: (r) => r.registrationNumber },
  { header: 'Workshop', value: (r) => r.workshop.name },
  { header: 'Workshop Date', value: (r) => r.workshop.workshopDate },
  { header: 'Student Name', value: (r) => r.studentName },
  { header: 'Grade', value: (r) => r.grade },
  { header: 'School', value: (r) => schoolNameOf(r) },
  { header: 'Contact Number', value: (r) => r.contactNumber },
  { header: 'Email', value: (r) => r.email },
  { header: 'Payment Status', value: (r) => REGISTRATION_STATUS_LABELS[r.paymentStatus] },
  {
    header: 'Fee',
    value: (r) => (isZeroAmount(r.workshop.fee) ? 'FREE' : formatAmount(r.workshop.fee)),
  },
  { header: 'Registered At', value: (r) => formatDateTime(r.registeredAt) },
];

export const PAYMENT_EXPORT_COLUMNS: SpreadsheetColumn<PaymentDetail>[] = [
  { header: 'Transaction ID', value: (p) => p.transactionId },
  { header: 'Registration Number', value: (p) => p.registration.registrationNumber },
  { header: 'Student Name', value: (p) => p.registration.studentName },
  {
    header: 'School',
    value: (p) => schoolNameOf({ school: p.school, legacySchoolName: p.registration.legacySchoolName }),
  },
  { header: 'Workshop', value: (p) => p.workshop.name },
  { header: 'Amount', value: (p) => formatAmount(p.amount) },
  { header: 'Currency', value: (p) => p.currency },
  { header: 'Status', value: (p) => p.paymentStatus },
  { header: 'Method', value: (p) => PAYMENT_METHOD_LABELS[p.paymentMethod] },
  { header: 'Initiated At', value: (p) => formatDateTime(p.initiatedAt) },
  {
    header: 'Completed At',
    value: (p) => (p.completedAt ? formatDateTime(p.completedAt) : 'N/A'),
  },
];
