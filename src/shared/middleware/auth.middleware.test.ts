import { describe, it, expect, beforeEach } from 'vitest';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { memoryStore } from '../../../tests/mocks/store.js';
import { firebaseAuthMock, createMockDecodedToken } from '../../../tests/mocks/firebase.js';
import { createMockUser } from '../../../tests/helpers/factories.js';
import { requireAuth, actorOf, invalidateUserCache } from './auth.middleware.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

// ============================================================================
// Test Helpers
// ============================================================================

/**
 * Creates a mock Fastify request object for testing middleware.
 */
function createMockRequest(overrides: Partial<FastifyRequest> = {}): FastifyRequest {
  return {
    headers: {},
    user: undefined,
    ...overrides,
  } as FastifyRequest;
}

function createMockReply(): FastifyReply {
  return {} as FastifyReply;
}

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error('Expected an AppError');
}

// ============================================================================
// requireAuth Tests
// ============================================================================

describe('requireAuth', () => {
  const mockReply = createMockReply();

  describe('Authorization Header Validation', () => {
    it('should throw 401 when authorization header is missing', async () => {
      const request = createMockRequest({ headers: {} });

      const error = await captureError(requireAuth(request, mockReply));

      expect(error.statusCode).toBe(401);
      expect(error.code).toBe(ErrorCodes.UNAUTHORIZED);
      expect(error.message).toBe('Missing or invalid authorization header');
      expect(firebaseAuthMock.verifyIdToken).not.toHaveBeenCalled();
    });

    it('should throw 401 when authorization header does not start with Bearer', async () => {
      const request = createMockRequest({
        headers: { authorization: 'Basic some-token' },
      });

      const error = await captureError(requireAuth(request, mockReply));

      expect(error.code).toBe(ErrorCodes.UNAUTHORIZED);
    });
  });

  describe('Token Verification', () => {
    it('should throw INVALID_TOKEN when Firebase rejects the token', async () => {
      firebaseAuthMock.verifyIdToken.mockRejectedValue(new Error('Token expired'));
      const request = createMockRequest({
        headers: { authorization: 'Bearer expired-token' },
      });

      const error = await captureError(requireAuth(request, mockReply));

      expect(error.statusCode).toBe(401);
      expect(error.code).toBe(ErrorCodes.INVALID_TOKEN);
      expect(error.message).toBe('Invalid or expired token');
      expect(firebaseAuthMock.verifyIdToken).toHaveBeenCalledWith('expired-token');
    });

    it('should throw 401 when no admin account matches the token', async () => {
      firebaseAuthMock.verifyIdToken.mockResolvedValue(
        createMockDecodedToken({ uid: 'missing-admin' })
      );
      const request = createMockRequest({
        headers: { authorization: 'Bearer valid-token' },
      });

      const error = await captureError(requireAuth(request, mockReply));

      expect(error.code).toBe(ErrorCodes.UNAUTHORIZED);
      expect(error.message).toBe('User not found in database');
    });

    it('should throw 401 when the admin account is disabled', async () => {
      const user = createMockUser({ active: false });
      memoryStore.addUser(user);
      firebaseAuthMock.verifyIdToken.mockResolvedValue(createMockDecodedToken({ uid: user.id }));
      const request = createMockRequest({
        headers: { authorization: 'Bearer valid-token' },
      });

      const error = await captureError(requireAuth(request, mockReply));

      expect(error.message).toBe('User account is disabled');
    });

    it('should attach the admin to the request', async () => {
      const user = createMockUser();
      memoryStore.addUser(user);
      firebaseAuthMock.verifyIdToken.mockResolvedValue(createMockDecodedToken({ uid: user.id }));
      const request = createMockRequest({
        headers: { authorization: 'Bearer valid-token' },
      });

      await requireAuth(request, mockReply);

      expect(request.user).toEqual(user);
    });
  });

  describe('User Cache', () => {
    const headers = { authorization: 'Bearer valid-token' };

    beforeEach(() => {
      firebaseAuthMock.verifyIdToken.mockResolvedValue(
        createMockDecodedToken({ uid: 'cached-admin' })
      );
    });

    it('should serve a repeated lookup from the cache', async () => {
      const user = createMockUser({ id: 'cached-admin' });
      memoryStore.addUser(user);
      await requireAuth(createMockRequest({ headers }), mockReply);

      memoryStore.addUser({ ...user, active: false });
      const request = createMockRequest({ headers });
      await requireAuth(request, mockReply);

      expect(request.user?.active).toBe(true);
    });

    it('should reload the account after invalidation', async () => {
      const user = createMockUser({ id: 'cached-admin' });
      memoryStore.addUser(user);
      await requireAuth(createMockRequest({ headers }), mockReply);

      memoryStore.addUser({ ...user, active: false });
      invalidateUserCache('cached-admin');

      const error = await captureError(requireAuth(createMockRequest({ headers }), mockReply));
      expect(error.message).toBe('User account is disabled');
    });
  });
});

// ============================================================================
// actorOf Tests
// ============================================================================

describe('actorOf', () => {
  it('should return the authenticated admin id', () => {
    const user = createMockUser({ id: 'admin-42' });
    expect(actorOf(createMockRequest({ user }))).toBe('admin-42');
  });

  it('should throw 401 without an authenticated admin', () => {
    expect(() => actorOf(createMockRequest())).toThrow('Authentication required');
  });
});
