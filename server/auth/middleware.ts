import type { RequestHandler } from "express";
import type { AuthUser } from "../../types";
import { adapt, HttpError } from "../errors";
import type { TokenVerifier } from "./verifier";

// Extend Express Request
declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export const NOT_AUTHENTICATED_MESSAGE = "Not authenticated";

export function bearerToken(header: string | undefined): string | null {
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header ?? "");
  return match ? match[1] : null;
}

export function requireAuth(verifier: TokenVerifier): RequestHandler {
  return adapt(async (req, _res, next) => {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      throw new HttpError(401, NOT_AUTHENTICATED_MESSAGE);
    }
    req.user = await verifier.verify(token);
    next();
  });
}

/** The authenticated user; only valid behind requireAuth. */
export function currentUser(req: Express.Request): AuthUser {
  if (!req.user) {
    throw new HttpError(401, NOT_AUTHENTICATED_MESSAGE);
  }
  return req.user;
}
