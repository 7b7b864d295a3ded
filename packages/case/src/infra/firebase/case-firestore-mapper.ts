import { z } from "zod";
import { DomainError, customerTypeSchema } from "@casekeeper/shared";
import { Case } from "../../domain/case.js";
import { CASE_STATUSES } from "../../domain/case-status.js";
import { CaseId } from "../../domain/value/case-id.js";
import { CustomerId } from "../../domain/value/customer-id.js";
import { createCustomerReference } from "../../domain/value/customer-reference.js";
import { OccurredAt } from "../../domain/value/occurred-at.js";

const storedCaseSchema = z.object({
  caseId: z.string().optional(),
  title: z.string(),
  description: z.string().nullish(),
  status: z.enum(CASE_STATUSES),
  customerId: z.string(),
  customerType: customerTypeSchema,
  createdByUid: z.string().default(""),
  createdAt: z.unknown(),
  updatedAt: z.unknown()
});

const hasToDate = (value: unknown): value is { toDate: () => unknown } =>
  typeof value === "object" &&
  value !== null &&
  "toDate" in value &&
  typeof value.toDate === "function";

const coerceDate = (value: unknown): Date => {
  if (value instanceof Date) {
    return value;
  }
  if (hasToDate(value)) {
    const converted = value.toDate();
    if (converted instanceof Date && !Number.isNaN(converted.getTime())) {
      return converted;
    }
  }
  if (typeof value === "string" || typeof value === "number") {
    const converted = new Date(value);
    if (!Number.isNaN(converted.getTime())) {
      return converted;
    }
  }
  return new Date(0);
};

export const mapCaseFromFirestore = (data: Record<string, unknown>, fallbackId: string): Case => {
  const parsed = storedCaseSchema.safeParse(data);
  if (!parsed.success) {
    throw new DomainError("CASE_RECORD_INVALID", `Stored case ${fallbackId} is invalid`);
  }
  const stored = parsed.data;
  return Case.reconstruct({
    caseId: CaseId.reconstruct(stored.caseId ?? fallbackId),
    title: stored.title,
    description: stored.description ?? null,
    status: stored.status,
    customer: createCustomerReference(stored.customerType, CustomerId.reconstruct(stored.customerId)),
    createdByUid: stored.createdByUid,
    createdAt: OccurredAt.create(coerceDate(stored.createdAt)),
    updatedAt: OccurredAt.create(coerceDate(stored.updatedAt))
  });
};

export const mapCaseToFirestore = (entity: Case) => ({
  caseId: entity.getCaseId().toString(),
  title: entity.getTitle(),
  description: entity.getDescription(),
  status: entity.getStatus(),
  customerId: entity.getCustomer().id.toString(),
  customerType: entity.getCustomer().type,
  createdByUid: entity.getCreatedByUid(),
  createdAt: entity.getCreatedAt().toDate(),
  updatedAt: entity.getUpdatedAt().toDate()
});
