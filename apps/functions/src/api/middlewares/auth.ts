import type { MiddlewareHandler } from "hono";
import { unauthorizedError } from "../deps.js";
import type { ApiBindings } from "../types.js";

/** Resolves the caller every case operation is attributed to. */
export const createAuthMiddleware = (): MiddlewareHandler<ApiBindings> => {
  return async (c, next) => {
    if (c.req.method === "OPTIONS") return next();
    const { getAuthUser } = c.get("deps");
    const caller = await getAuthUser(c.req.header("Authorization"));
    // createdByUid is stamped from this value
    if (caller.uid.trim().length === 0) {
      throw unauthorizedError();
    }
    c.set("auth", { uid: caller.uid.trim(), email: caller.email ?? null });
    await next();
  };
};
