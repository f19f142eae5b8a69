import type { Payment } from '@/database/schema.js';
import type { RegistrationDetail } from '@/database/store.js';
import { config } from '@config/app.config.js';
import { formatDateTime, formatMoney, schoolNameOf } from '@shared/utils/format.js';
import { isZeroAmount } from '@shared/utils/money.js';

export interface EmailContent {
  subject: string;
  plainText: string;
  html: string;
}

type Row = [label: string, value: string];

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function workshopRows(registration: RegistrationDetail): Row[] {
  const { workshop } = registration;
  return [
    ['Registration Number', registration.registrationNumber],
    ['Workshop', workshop.name],
    ['Date', workshop.workshopDate],
    ['Time', workshop.time],
    ['Venue', workshop.venue],
  ];
}

function render(subject: string, greeting: string, intro: string, sections: Array<[string, Row[]]>, closing: string): EmailContent {
  const signature = config.sendgrid.fromName;

  const plainText = [
    greeting,
    '',
    intro,
    '',
    ...sections.flatMap(([title, rows]) => [
      `${title}:`,
      ...rows.map(([label, value]) => `- ${label}: ${value}`),
      '',
    ]),
    closing,
    '',
    'Best regards,',
    signature,
  ].join('\n');

  const html = [
    `<p>${escapeHtml(greeting)}</p>`,
    `<p>${escapeHtml(intro)}</p>`,
    ...sections.map(
      ([title, rows]) =>
        `<h3>${escapeHtml(title)}</h3><table>${rows
          .map(([label, value]) => `<tr><td><strong>${escapeHtml(label)}</strong></td><td>${escapeHtml(value)}</td></tr>`)
          .join('')}</table>`
    ),
    `<p>${escapeHtml(closing)}</p>`,
    `<p>Best regards,<br>${escapeHtml(signature)}</p>`,
  ].join('\n');

  return { subject, plainText, html };
}

export function registrationConfirmationEmail(registration: RegistrationDetail): EmailContent {
  const { workshop } = registration;
  const fee = isZeroAmount(workshop.fee) ? 'FREE' : formatMoney(workshop.fee);

  return render(
    `Workshop Registration Confirmed - ${workshop.name}`,
    `Dear ${registration.studentName},`,
    `Your registration for the workshop "${workshop.name}" has been received.`,
    [
      ['Registration Details', [...workshopRows(registration), ['Fee', fee]]],
      [
        'Student Information',
        [
          ['Name', registration.studentName],
          ['Grade', String(registration.grade)],
          ['School', schoolNameOf(registration)],
          ['Contact', registration.contactNumber],
          ['Email', registration.email],
        ],
      ],
    ],
    'Please save your registration number for future reference.'
  );
}

export function paymentConfirmationEmail(
  registration: RegistrationDetail,
  payment: Payment
): EmailContent {
  const { workshop } = registration;

  return render(
    `Payment Confirmed - ${workshop.name}`,
    `Dear ${registration.studentName},`,
    `Your payment for the workshop "${workshop.name}" has been successfully processed.`,
    [
      [
        'Payment Details',
        [
          ['Transaction ID', payment.transactionId],
          ['Amount', formatMoney(payment.amount, payment.currency)],
          ['Status', 'Completed'],
          ['Date', payment.completedAt ? formatDateTime(payment.completedAt) : 'N/A'],
        ],
      ],
      ['Registration Details', workshopRows(registration)],
    ],
    'You can download your receipt from the website using your registration number.'
  );
}
