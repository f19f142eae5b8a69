import { describe, it, expect } from 'vitest';
import { PDFDocument, PDFName, PDFRawStream } from 'pdf-lib';
import {
  createMockPayment,
  createMockRegistration,
  createMockWorkshop,
} from '../../../tests/helpers/factories.js';
import { receiptFileName, receiptQrPayload, renderReceipt } from './receipt.service.js';
import type { RegistrationDetail } from '@/database/store.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

function detail(overrides: Partial<RegistrationDetail> = {}): RegistrationDetail {
  const workshop = createMockWorkshop({ name: 'Robotics Basics', fee: '200.00' });
  return {
    ...createMockRegistration({
      workshopId: workshop.id,
      registrationNumber: 'REG-20261019-ABCDE',
      paymentStatus: 'completed',
    }),
    workshop,
    school: null,
    payment: null,
    ...overrides,
  };
}

function imageCount(pdf: PDFDocument): number {
  return pdf.context
    .enumerateIndirectObjects()
    .filter(
      ([, object]) =>
        object instanceof PDFRawStream && object.dict.get(PDFName.of('Subtype')) === PDFName.of('Image')
    ).length;
}

describe('Receipt Service', () => {
  it('should render a one page PDF for a paid registration', async () => {
    const registration = detail();
    const payment = createMockPayment({
      registrationId: registration.id,
      paymentStatus: 'completed',
      completedAt: new Date('2026-10-19T05:00:00Z'),
    });

    const content = await renderReceipt({ ...registration, payment });
    const pdf = await PDFDocument.load(content);

    expect(pdf.getPageCount()).toBe(1);
    expect(pdf.getTitle()).toBe('Receipt REG-20261019-ABCDE');
  });

  it('should embed the registration QR code', async () => {
    const pdf = await PDFDocument.load(await renderReceipt(detail({ paymentStatus: 'free' })));

    expect(imageCount(pdf)).toBeGreaterThan(0);
    expect(receiptQrPayload('REG-20261019-ABCDE')).toBe('REG:REG-20261019-ABCDE');
  });

  it('should render names the standard fonts cannot encode', async () => {
    const content = await renderReceipt(
      detail({ studentName: 'Ayesha Siddiqua মাহি', legacySchoolName: 'Café School' })
    );

    expect(Buffer.from(content.slice(0, 5)).toString('latin1')).toBe('%PDF-');
  });

  it.each(['pending', 'failed', 'cancelled'] as const)(
    'should refuse a %s registration with 404',
    async (paymentStatus) => {
      await expect(renderReceipt(detail({ paymentStatus }))).rejects.toMatchObject({
        statusCode: 404,
        code: ErrorCodes.NOT_FOUND,
        message: 'Receipt not available',
      });
    }
  );

  it('should name the file after the registration number', () => {
    expect(receiptFileName('REG-20261019-ABCDE')).toBe('receipt_REG-20261019-ABCDE.pdf');
  });
});
