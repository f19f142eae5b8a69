import { describe, it, expect } from 'vitest';
import {
  canTransitionPaymentStatus,
  getPaymentState,
  isReceiptAvailable,
  isTerminalPaymentStatus,
  resolveRegistrationStatus,
  toRegistrationStatus,
} from './payment-status.js';

describe('Payment Status', () => {
  describe('resolveRegistrationStatus', () => {
    it('should force free workshops to free', () => {
      expect(resolveRegistrationStatus('completed', true)).toBe('free');
      expect(resolveRegistrationStatus('pending', true)).toBe('free');
    });

    it('should keep the requested status for paid workshops', () => {
      expect(resolveRegistrationStatus(toRegistrationStatus('cancelled'), false)).toBe(
        'cancelled'
      );
    });
  });

  describe('transitions', () => {
    it('should only leave pending', () => {
      expect(canTransitionPaymentStatus('pending', 'completed')).toBe(true);
      expect(canTransitionPaymentStatus('pending', 'failed')).toBe(true);
      expect(canTransitionPaymentStatus('completed', 'failed')).toBe(false);
      expect(canTransitionPaymentStatus('cancelled', 'completed')).toBe(false);
    });

    it('should treat every non-pending status as terminal', () => {
      expect(isTerminalPaymentStatus('pending')).toBe(false);
      expect(isTerminalPaymentStatus('completed')).toBe(true);
      expect(isTerminalPaymentStatus('failed')).toBe(true);
    });
  });

  describe('getPaymentState', () => {
    it('should report Free regardless of payment', () => {
      expect(getPaymentState({ paymentStatus: 'free' }, null)).toBe('Free');
    });

    it('should report NoPayment before initiation', () => {
      expect(getPaymentState({ paymentStatus: 'pending' }, null)).toBe('NoPayment');
    });

    it('should report Completed for an administrative override without payment', () => {
      expect(getPaymentState({ paymentStatus: 'completed' }, null)).toBe('Completed');
    });

    it('should follow the payment row once one exists', () => {
      expect(getPaymentState({ paymentStatus: 'pending' }, { paymentStatus: 'pending' })).toBe(
        'AwaitingCallback'
      );
      expect(getPaymentState({ paymentStatus: 'failed' }, { paymentStatus: 'failed' })).toBe(
        'Failed'
      );
      expect(
        getPaymentState({ paymentStatus: 'cancelled' }, { paymentStatus: 'cancelled' })
      ).toBe('Cancelled');
    });
  });

  it('should offer receipts for completed and free registrations only', () => {
    expect(isReceiptAvailable('completed')).toBe(true);
    expect(isReceiptAvailable('free')).toBe(true);
    expect(isReceiptAvailable('pending')).toBe(false);
    expect(isReceiptAvailable('failed')).toBe(false);
  });
});
