export type ApiConfig = {
  basePath: string;
  casesCollection: string;
  locksCollection: string;
  /** null reflects the request origin */
  corsOrigin: string | null;
};

const readEnv = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ApiConfig => ({
  basePath: readEnv(env, "API_BASE_PATH") ?? "/v1",
  casesCollection: readEnv(env, "CASES_COLLECTION") ?? "cases",
  locksCollection: readEnv(env, "ACTIVE_CASE_LOCKS_COLLECTION") ?? "activeCaseLocks",
  corsOrigin: readEnv(env, "CORS_ORIGIN") ?? null
});
