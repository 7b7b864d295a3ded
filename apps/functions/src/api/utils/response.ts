import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ApiBindings } from "../types.js";

export const jsonOk = <T>(c: Context<ApiBindings>, data?: T, status: ContentfulStatusCode = 200) => {
  if (data === undefined) return c.json({ ok: true }, status);
  return c.json({ ok: true, data }, status);
};

export const jsonError = (
  c: Context<ApiBindings>,
  status: ContentfulStatusCode,
  code: string,
  message: string
) => {
  return c.json({ ok: false, code, message }, status);
};
