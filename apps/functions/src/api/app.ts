import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { ActiveCaseExistsError, CaseNotFoundError } from "@casekeeper/case";
import { DomainError } from "@casekeeper/shared";
import { loadConfig, type ApiConfig } from "./config.js";
import { assertApiDeps } from "./deps.js";
import type { ApiBindings, ApiDeps } from "./types.js";
import { createAuthMiddleware } from "./middlewares/auth.js";
import { casesRoutes } from "./routes/cases.js";
import { jsonError } from "./utils/response.js";

export const createApp = (deps: ApiDeps, config: ApiConfig = loadConfig()) => {
  assertApiDeps(deps);

  const app = new Hono<ApiBindings>().basePath(config.basePath);

  app.use("*", async (c, next) => {
    c.set("deps", deps);
    await next();
  });

  app.use(
    "*",
    cors({
      origin: (origin) => config.corsOrigin ?? origin ?? "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"]
    })
  );

  const cases = new Hono<ApiBindings>();
  cases.use("*", createAuthMiddleware());
  cases.route("/", casesRoutes());
  app.route("/cases", cases);

  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse();
    if (err.message === "UNAUTHORIZED") {
      return jsonError(c, 401, "UNAUTHORIZED", "Authentication required");
    }
    if (err instanceof ActiveCaseExistsError) {
      return jsonError(c, 409, err.code, err.message);
    }
    if (err instanceof CaseNotFoundError) {
      return jsonError(c, 404, err.code, err.message);
    }
    if (err instanceof DomainError) {
      return jsonError(c, 400, err.code, err.message);
    }
    deps.logger.error("Unhandled API error", {
      path: c.req.path,
      name: err.name,
      message: err.message
    });
    return jsonError(c, 500, "INTERNAL_ERROR", "Internal server error");
  });

  app.notFound((c) => jsonError(c, 404, "NOT_FOUND", "Not found"));

  return app;
};
