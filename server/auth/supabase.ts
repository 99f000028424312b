import { createClient } from "@supabase/supabase-js";
import type { AuthUser } from "../../types";
import { HttpError } from "../errors";
import { INVALID_TOKEN_MESSAGE } from "./jwt";
import type { TokenVerifier } from "./verifier";

// The slice of supabase-js' GoTrue client this service needs.
export interface SupabaseAuthApi {
  getUser(jwt: string): Promise<{
    data: { user: { id: string; email?: string } | null } | null;
    error: { message: string } | null;
  }>;
}

export class SupabaseTokenVerifier implements TokenVerifier {
  constructor(private readonly auth: SupabaseAuthApi) {}

  static fromCredentials(url: string, serviceKey: string) {
    const client = createClient(url, serviceKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
    return new SupabaseTokenVerifier(client.auth);
  }

  async verify(token: string): Promise<AuthUser> {
    let result: Awaited<ReturnType<SupabaseAuthApi["getUser"]>>;
    try {
      result = await this.auth.getUser(token);
    } catch (e) {
      console.error("[Auth] Supabase getUser failed:", e);
      throw new HttpError(401, INVALID_TOKEN_MESSAGE);
    }

    const user = result.data?.user;
    if (result.error || !user) {
      if (result.error) console.warn(`[Auth] Token rejected by Supabase: ${result.error.message}`);
      throw new HttpError(401, INVALID_TOKEN_MESSAGE);
    }
    const { id, email } = user;
    return email ? { id, email } : { id };
  }
}
