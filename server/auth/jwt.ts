import jwt from "jsonwebtoken";
import type { AuthUser } from "../../types";
import { HttpError } from "../errors";
import type { TokenVerifier } from "./verifier";

export const INVALID_TOKEN_MESSAGE = "Invalid or expired token";

// Supabase access tokens are HS256 JWTs signed with the project's JWT secret,
// so they can be checked without a round trip to the auth server.
export class JwtTokenVerifier implements TokenVerifier {
  constructor(private readonly secret: string) {}

  async verify(token: string): Promise<AuthUser> {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, { algorithms: ["HS256"] });
    } catch {
      throw new HttpError(401, INVALID_TOKEN_MESSAGE);
    }

    if (typeof payload === "string" || typeof payload.sub !== "string" || !payload.sub) {
      throw new HttpError(401, INVALID_TOKEN_MESSAGE);
    }
    const email = payload["email"];
    return typeof email === "string" ? { id: payload.sub, email } : { id: payload.sub };
  }
}

export function signToken(secret: string, user: AuthUser, expiresInSeconds = 3600) {
  return jwt.sign({ email: user.email }, secret, {
    subject: user.id,
    expiresIn: expiresInSeconds,
    algorithm: "HS256",
  });
}
