import { Hono } from "hono";
import {
  CancelCase,
  CaseId,
  CaseTargetInvalidError,
  CreateCase,
  CustomerId,
  EnforceSingleActiveCase,
  GetCase,
  ListCasesByCustomer,
  OccurredAt,
  ResolveCase,
  resolveCustomerReference,
  type Case
} from "@casekeeper/case";
import { caseCreateInputSchema, caseListQuerySchema, isPlainObject } from "@casekeeper/shared";
import type { ApiBindings } from "../types.js";
import { jsonError, jsonOk } from "../utils/response.js";

export const toCaseResponse = (entity: Case) => ({
  caseId: entity.getCaseId().toString(),
  title: entity.getTitle(),
  description: entity.getDescription(),
  status: entity.getStatus(),
  customer: {
    type: entity.getCustomer().type,
    id: entity.getCustomer().id.toString()
  },
  createdByUid: entity.getCreatedByUid(),
  createdAt: entity.getCreatedAt().toISOString(),
  updatedAt: entity.getUpdatedAt().toISOString()
});

export const casesRoutes = () => {
  const app = new Hono<ApiBindings>();

  app.post("/", async (c) => {
    const auth = c.get("auth");
    const body: unknown = await c.req.json().catch(() => null);
    if (!isPlainObject(body)) {
      throw new CaseTargetInvalidError();
    }
    // A pending case without a usable customer is an integrity failure before
    // any field-level validation.
    resolveCustomerReference(body);
    const parsed = caseCreateInputSchema.safeParse(body);
    if (!parsed.success) {
      return jsonError(c, 400, "VALIDATION_ERROR", parsed.error.issues[0]?.message ?? "Invalid input");
    }

    const { caseRepoFor, now, logger } = c.get("deps");
    const repo = caseRepoFor(auth.uid);
    const usecase = new CreateCase(repo, new EnforceSingleActiveCase(repo, logger));
    const created = await usecase.execute({
      pending: body,
      title: parsed.data.title,
      description: parsed.data.description ?? null,
      createdByUid: auth.uid,
      now: OccurredAt.create(now())
    });

    return jsonOk(c, toCaseResponse(created));
  });

  app.get("/", async (c) => {
    const parsed = caseListQuerySchema.safeParse({ customerId: c.req.query("customerId") });
    if (!parsed.success) {
      return jsonError(c, 400, "VALIDATION_ERROR", parsed.error.issues[0]?.message ?? "Invalid input");
    }
    const repo = c.get("deps").caseRepoFor(c.get("auth").uid);
    const cases = await new ListCasesByCustomer(repo).execute(
      CustomerId.create(parsed.data.customerId)
    );
    return jsonOk(c, cases.map(toCaseResponse));
  });

  app.get("/:caseId", async (c) => {
    const repo = c.get("deps").caseRepoFor(c.get("auth").uid);
    const found = await new GetCase(repo).execute(CaseId.create(c.req.param("caseId")));
    return jsonOk(c, toCaseResponse(found));
  });

  app.post("/:caseId/resolve", async (c) => {
    const { caseRepoFor, now } = c.get("deps");
    const resolved = await new ResolveCase(caseRepoFor(c.get("auth").uid)).execute({
      caseId: CaseId.create(c.req.param("caseId")),
      now: OccurredAt.create(now())
    });
    return jsonOk(c, toCaseResponse(resolved));
  });

  app.post("/:caseId/cancel", async (c) => {
    const { caseRepoFor, now } = c.get("deps");
    const cancelled = await new CancelCase(caseRepoFor(c.get("auth").uid)).execute({
      caseId: CaseId.create(c.req.param("caseId")),
      now: OccurredAt.create(now())
    });
    return jsonOk(c, toCaseResponse(cancelled));
  });

  return app;
};
