import {
  createClient,
  type SupabaseClient,
  type SupabaseClientOptions,
} from "@supabase/supabase-js";
import WebSocket from "ws";

import { assertRequiredEnv, DB_ERROR_CODES, DbError } from "./errors.ts";

export type DbClient = SupabaseClient;
export type DbEnv = Record<string, string | undefined>;

export type DbCreateClientImpl = (
  supabaseUrl: string,
  supabaseKey: string,
  options: SupabaseClientOptions<"public">,
) => DbClient;

export type CreateDbClientParams = {
  env?: DbEnv;
  createClientImpl?: DbCreateClientImpl;
  clientOptions?: SupabaseClientOptions<"public">;
};

/**
 * Service-role client for server-side scripts; sessions are never persisted.
 * Node.js 20 has no global WebSocket, so realtime gets the `ws` transport.
 */
export function createDbClient(params: CreateDbClientParams = {}): DbClient {
  const env = params.env ?? process.env;
  const supabaseUrl = assertRequiredEnv("SUPABASE_URL", env.SUPABASE_URL);
  const serviceRoleKey = assertRequiredEnv(
    "SUPABASE_SERVICE_ROLE_KEY",
    env.SUPABASE_SERVICE_ROLE_KEY,
  );

  if (!/^https?:\/\//i.test(supabaseUrl)) {
    throw new DbError(DB_ERROR_CODES.INVALID_ENV, "SUPABASE_URL must be an http(s) URL", {
      status: 500,
      context: { env_var: "SUPABASE_URL" },
    });
  }

  const createClientImpl = params.createClientImpl ?? createClient;
  try {
    return createClientImpl(supabaseUrl, serviceRoleKey, {
      ...params.clientOptions,
      realtime: {
        transport: WebSocket,
        ...params.clientOptions?.realtime,
      },
      auth: {
        persistSession: false,
        autoRefreshToken: false,
        ...params.clientOptions?.auth,
      },
    });
  } catch (error) {
    throw DbError.fromUnknown({
      code: DB_ERROR_CODES.CLIENT_INIT_FAILED,
      message: "Unable to initialize Supabase client.",
      error,
      context: { supabase_url: supabaseUrl },
    });
  }
}
