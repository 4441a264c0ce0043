/**
 * Type augmentation for Express Request.
 * Adds the `user` property that the auth middleware attaches after token
 * verification, and the `requestId` set by the request logger.
 */

export interface AuthUser {
  userId: number;
}

declare global {
  namespace Express {
    interface Request {
      /** Populated by requireAuth. */
      user?: AuthUser;
      /** Populated by requestLogger. */
      requestId?: string;
    }
  }
}
