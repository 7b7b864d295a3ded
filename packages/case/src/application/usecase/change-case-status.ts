import type { Case } from "../../domain/case.js";
import { CaseNotFoundError } from "../../domain/case-errors.js";
import { CaseId } from "../../domain/value/case-id.js";
import { OccurredAt } from "../../domain/value/occurred-at.js";
import type { CaseRepository } from "../port/case-repository.js";

export type ChangeCaseStatusInput = {
  caseId: CaseId;
  now: OccurredAt;
};

const loadCase = async (repository: CaseRepository, caseId: CaseId): Promise<Case> => {
  const found = await repository.findById(caseId);
  if (!found) {
    throw new CaseNotFoundError(caseId.toString());
  }
  return found;
};

export class ResolveCase {
  constructor(private readonly repository: CaseRepository) {}

  async execute(input: ChangeCaseStatusInput): Promise<Case> {
    const resolved = (await loadCase(this.repository, input.caseId)).resolve(input.now);
    await this.repository.update(resolved);
    return resolved;
  }
}

export class CancelCase {
  constructor(private readonly repository: CaseRepository) {}

  async execute(input: ChangeCaseStatusInput): Promise<Case> {
    const cancelled = (await loadCase(this.repository, input.caseId)).cancel(input.now);
    await this.repository.update(cancelled);
    return cancelled;
  }
}
