export type FunctionRequest = {
  method?: string;
  url?: string;
  protocol?: string;
  hostname?: string;
  headers?: Record<string, string | string[] | undefined>;
  body?: unknown;
};

export type FetchApp = {
  fetch(request: Request): Response | Promise<Response>;
};

export type FunctionResponse = {
  status(code: number): unknown;
  json(body: unknown): unknown;
  send(body: unknown): unknown;
  setHeader?(key: string, value: string): unknown;
};

const toRequestBody = (rawBody: unknown): string | undefined => {
  if (rawBody === undefined || rawBody === null) return undefined;
  if (typeof rawBody === "string") return rawBody;
  if (rawBody instanceof Uint8Array) return Buffer.from(rawBody).toString("utf8");
  return JSON.stringify(rawBody);
};

/** Adapts the functions request/response pair to the fetch-style Hono app. */
export const requestHandler = (app: FetchApp) => {
  return async (req: FunctionRequest, res: FunctionResponse): Promise<void> => {
    const method = String(req.method ?? "GET").toUpperCase();
    const protocol = req.protocol ?? "https";
    const hostname = req.hostname ?? "localhost";
    const url = new URL(`${protocol}://${hostname}${req.url ?? ""}`);
    const headers = new Headers();
    Object.entries(req.headers ?? {}).forEach(([key, value]) => {
      if (typeof value === "string") {
        headers.set(key, value);
        return;
      }
      if (Array.isArray(value)) {
        headers.set(key, value.join(","));
      }
    });

    let body: string | undefined;
    if (!["GET", "HEAD"].includes(method)) {
      const rawBody = req.body;
      body = toRequestBody(rawBody);
      const serialized = typeof rawBody !== "string" && !(rawBody instanceof Uint8Array);
      if (body !== undefined && serialized && !headers.has("content-type")) {
        headers.set("content-type", "application/json");
      }
    }

    const honoRes = await app.fetch(
      new Request(url.toString(), {
        method,
        headers,
        body
      })
    );

    const setHeader = res.setHeader?.bind(res);
    if (setHeader) {
      honoRes.headers.forEach((value, key) => {
        setHeader(key, value);
      });
    }

    res.status(honoRes.status);
    const contentType = honoRes.headers.get("content-type") ?? "";
    if (contentType.includes("application/json")) {
      res.json(await honoRes.json());
      return;
    }
    res.send(await honoRes.text());
  };
};
