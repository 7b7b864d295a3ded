import { FirestoreCaseRepository } from "@casekeeper/case";
import { DomainError } from "@casekeeper/shared";
import { getAuth } from "firebase-admin/auth";
import * as logger from "firebase-functions/logger";
import { loadConfig, type ApiConfig } from "./config.js";
import type { ApiDeps } from "./types.js";

const unauthorizedError = () => new Error("UNAUTHORIZED");

export class HostConfigurationError extends DomainError {
  constructor(message: string) {
    super("HOST_CONFIGURATION_ERROR", message);
    this.name = "HostConfigurationError";
  }
}

/** Whatever the host hands over before it has been checked. */
export type ServiceProvider = { readonly [K in keyof ApiDeps]?: unknown };

const requireService = (provider: ServiceProvider, key: keyof ApiDeps, name: string): unknown => {
  const service = provider[key];
  if (service === undefined || service === null) {
    throw new HostConfigurationError(`${name} unavailable`);
  }
  return service;
};

const hasMethods = (value: unknown, methods: string[]): boolean =>
  typeof value === "object" &&
  value !== null &&
  methods.every((method) => typeof Reflect.get(value, method) === "function");

export function assertApiDeps(provider: ServiceProvider): asserts provider is ApiDeps {
  const checks: Array<[keyof ApiDeps, string, (value: unknown) => boolean]> = [
    ["caseRepoFor", "Case repository factory", (value) => typeof value === "function"],
    ["now", "Clock", (value) => typeof value === "function"],
    ["getAuthUser", "Auth resolver", (value) => typeof value === "function"],
    ["logger", "Tracing service", (value) => hasMethods(value, ["info", "warn", "error"])]
  ];
  for (const [key, name, isExpectedType] of checks) {
    if (!isExpectedType(requireService(provider, key, name))) {
      throw new HostConfigurationError(`${name} is not of the expected type`);
    }
  }
}

const isAuthError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string" &&
  error.code.startsWith("auth/");

export const createDefaultDeps = (config: ApiConfig = loadConfig()): ApiDeps => {
  const getAuthUser = async (authHeader: string | null | undefined) => {
    const match = String(authHeader ?? "").match(/^Bearer (.+)$/);
    if (!match?.[1]) throw unauthorizedError();
    try {
      const decoded = await getAuth().verifyIdToken(match[1]);
      return { uid: decoded.uid, email: decoded.email ?? null };
    } catch (error) {
      if (isAuthError(error)) {
        throw unauthorizedError();
      }
      throw error;
    }
  };

  return {
    caseRepoFor: (callerUid: string) =>
      new FirestoreCaseRepository({
        callerUid,
        casesCollection: config.casesCollection,
        locksCollection: config.locksCollection
      }),
    now: () => new Date(),
    getAuthUser,
    logger
  };
};

export { unauthorizedError };
