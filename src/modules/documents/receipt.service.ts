import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from 'pdf-lib';
import QRCode from 'qrcode';
import type { RegistrationDetail } from '@/database/store.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { REGISTRATION_STATUS_LABELS } from '@shared/constants/status-labels.js';
import { formatDateTime, formatMoney, schoolNameOf } from '@shared/utils/format.js';
import { isZeroAmount } from '@shared/utils/money.js';
import { isReceiptAvailable } from '@modules/payments/payment-status.js';

const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const MARGIN = 50;
const LABEL_WIDTH = 150;
const QR_SIZE = 110;

const INK = rgb(0.08, 0.13, 0.2);
const MUTED = rgb(0.4, 0.4, 0.4);
const ACCENT = rgb(0.21, 0.38, 0.57);

export function receiptFileName(registrationNumber: string): string {
  return `receipt_${registrationNumber}.pdf`;
}

// Standard fonts only encode WinAnsi
function printable(value: string): string {
  return value.replace(/[^\x20-\x7E]/g, '?');
}

/** Payload scanned at the venue to look the registration up. */
export function receiptQrPayload(registrationNumber: string): string {
  return `REG:${registrationNumber}`;
}

function renderQrCode(payload: string): Promise<Buffer> {
  return QRCode.toBuffer(payload, {
    type: 'png',
    width: 240,
    margin: 1,
    errorCorrectionLevel: 'M',
  });
}

interface Cursor {
  page: PDFPage;
  y: number;
}

/**
 * Renders the receipt for a registration that is paid or free.
 * Anything else is reported as not found.
 */
export async function renderReceipt(
  registration: RegistrationDetail,
  generatedAt: Date = new Date()
): Promise<Uint8Array> {
  if (!isReceiptAvailable(registration.paymentStatus)) {
    throw new AppError('Receipt not available', 404, true, ErrorCodes.NOT_FOUND);
  }

  const { workshop, payment } = registration;

  const doc = await PDFDocument.create();
  doc.setTitle(`Receipt ${registration.registrationNumber}`);
  const font = await doc.embedFont(StandardFonts.Helvetica);
  const boldFont = await doc.embedFont(StandardFonts.HelveticaBold);

  const cursor: Cursor = { page: doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]), y: PAGE_HEIGHT - MARGIN };

  const drawLine = (text: string, size: number, lineFont: PDFFont, color = INK) => {
    cursor.page.drawText(printable(text), { x: MARGIN, y: cursor.y, size, font: lineFont, color });
    cursor.y -= size + 8;
  };

  const drawSection = (title: string, rows: Array<[string, string]>) => {
    cursor.y -= 10;
    drawLine(title, 13, boldFont, ACCENT);
    cursor.page.drawLine({
      start: { x: MARGIN, y: cursor.y + 14 },
      end: { x: PAGE_WIDTH - MARGIN, y: cursor.y + 14 },
      thickness: 0.5,
      color: ACCENT,
    });
    for (const [label, value] of rows) {
      cursor.page.drawText(printable(`${label}:`), {
        x: MARGIN,
        y: cursor.y,
        size: 10,
        font: boldFont,
        color: INK,
      });
      cursor.page.drawText(printable(value), {
        x: MARGIN + LABEL_WIDTH,
        y: cursor.y,
        size: 10,
        font,
        color: INK,
      });
      cursor.y -= 18;
    }
  };

  drawLine('Workshop Registration Receipt', 20, boldFont, ACCENT);
  drawLine(`Registration Number: ${registration.registrationNumber}`, 12, boldFont);

  drawSection('Workshop Details', [
    ['Workshop', workshop.name],
    ['Date', workshop.workshopDate],
    ['Time', workshop.time],
    ['Duration', workshop.duration],
    ['Venue', workshop.venue],
  ]);

  drawSection('Student Information', [
    ['Student Name', registration.studentName],
    ['Grade', String(registration.grade)],
    ['School', schoolNameOf(registration)],
    ['Contact Number', registration.contactNumber],
    ['Email', registration.email],
  ]);

  const paymentRows: Array<[string, string]> = [
    ['Fee', isZeroAmount(workshop.fee) ? 'FREE' : formatMoney(workshop.fee)],
    ['Status', REGISTRATION_STATUS_LABELS[registration.paymentStatus]],
    ['Registration Date', formatDateTime(registration.registeredAt)],
  ];
  if (payment) {
    paymentRows.push(['Transaction ID', payment.transactionId]);
    if (payment.completedAt) {
      paymentRows.push(['Payment Date', formatDateTime(payment.completedAt)]);
    }
  }
  drawSection('Payment Information', paymentRows);

  const qrPng = await renderQrCode(receiptQrPayload(registration.registrationNumber));
  const qrImage = await doc.embedPng(qrPng);
  cursor.y -= QR_SIZE + 10;
  cursor.page.drawImage(qrImage, { x: MARGIN, y: cursor.y, width: QR_SIZE, height: QR_SIZE });

  cursor.page.drawText(printable(`Generated on ${formatDateTime(generatedAt)}`), {
    x: MARGIN,
    y: MARGIN,
    size: 8,
    font,
    color: MUTED,
  });

  return doc.save();
}
