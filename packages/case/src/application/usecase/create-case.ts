import { Case } from "../../domain/case.js";
import { OccurredAt } from "../../domain/value/occurred-at.js";
import type { CaseRepository } from "../port/case-repository.js";
import type { EnforceSingleActiveCase, PendingCaseRecord } from "./enforce-single-active-case.js";

export type CreateCaseInput = {
  pending: PendingCaseRecord;
  title: string;
  description: string | null;
  createdByUid: string;
  now: OccurredAt;
};

export class CreateCase {
  constructor(
    private readonly repository: CaseRepository,
    private readonly guard: EnforceSingleActiveCase
  ) {}

  async execute(input: CreateCaseInput): Promise<Case> {
    const customer = await this.guard.execute(input.pending);
    const caseId = await this.repository.generateId();
    const created = Case.create({
      caseId,
      title: input.title,
      description: input.description,
      customer,
      createdByUid: input.createdByUid,
      now: input.now
    });
    await this.repository.create(created);
    return created;
  }
}
