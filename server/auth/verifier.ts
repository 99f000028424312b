import type { AuthUser } from "../../types";
import type { AuthConfig } from "../config";
import { JwtTokenVerifier } from "./jwt";
import { SupabaseTokenVerifier } from "./supabase";

export interface TokenVerifier {
  /** Resolves the user behind a bearer token, rejecting with a 401 HttpError otherwise. */
  verify(token: string): Promise<AuthUser>;
}

export function createVerifier(auth: AuthConfig): TokenVerifier {
  if (auth.provider === "supabase") {
    return SupabaseTokenVerifier.fromCredentials(auth.supabaseUrl, auth.supabaseServiceKey);
  }
  return new JwtTokenVerifier(auth.jwtSecret);
}
