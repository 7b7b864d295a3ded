export const CASE_STATUSES = ["ACTIVE", "RESOLVED", "CANCELLED"] as const;

export type CaseStatus = (typeof CASE_STATUSES)[number];

export const isCaseStatus = (value: unknown): value is CaseStatus =>
  CASE_STATUSES.some((status) => status === value);
