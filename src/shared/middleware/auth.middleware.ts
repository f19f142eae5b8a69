import type { FastifyRequest, FastifyReply } from "fastify";
import { verifyToken } from "@shared/services/firebase.service.js";
import { store } from "@/database/store.js";
import { AppError } from "@shared/errors/app-error.js";
import { ErrorCodes } from "@shared/errors/error-codes.js";
import { SimpleCache } from "@shared/utils/cache.js";
import type { User } from "@/database/schema.js";

// Cache user lookups for 60 seconds to reduce DB hits
const userCache = new SimpleCache<User>(60);

export function invalidateUserCache(userId: string): void {
  userCache.invalidate(userId);
}

export function clearUserCache(): void {
  userCache.clear();
}

/**
 * Requires a Firebase ID token belonging to an active admin account.
 * Attaches the account to `request.user`.
 */
export async function requireAuth(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  const authHeader = request.headers.authorization;

  if (!authHeader?.startsWith("Bearer ")) {
    throw new AppError(
      "Missing or invalid authorization header",
      401,
      true,
      ErrorCodes.UNAUTHORIZED,
    );
  }

  const token = authHeader.slice("Bearer ".length);

  try {
    const decoded = await verifyToken(token);
    const user = await userCache.remember(decoded.uid, () =>
      store.users.findById(decoded.uid),
    );

    if (!user) {
      throw new AppError(
        "User not found in database",
        401,
        true,
        ErrorCodes.UNAUTHORIZED,
      );
    }

    if (!user.active) {
      throw new AppError(
        "User account is disabled",
        401,
        true,
        ErrorCodes.UNAUTHORIZED,
      );
    }

    request.user = user;
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new AppError(
      "Invalid or expired token",
      401,
      true,
      ErrorCodes.INVALID_TOKEN,
    );
  }
}

/**
 * Id of the authenticated admin; only valid behind `requireAuth`.
 */
export function actorOf(request: FastifyRequest): string {
  if (!request.user) {
    throw new AppError("Authentication required", 401, true, ErrorCodes.UNAUTHORIZED);
  }
  return request.user.id;
}
