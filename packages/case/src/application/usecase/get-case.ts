import type { Case } from "../../domain/case.js";
import { CaseNotFoundError } from "../../domain/case-errors.js";
import { CaseId } from "../../domain/value/case-id.js";
import type { CaseRepository } from "../port/case-repository.js";

export class GetCase {
  constructor(private readonly repository: CaseRepository) {}

  async execute(caseId: CaseId): Promise<Case> {
    const found = await this.repository.findById(caseId);
    if (!found) {
      throw new CaseNotFoundError(caseId.toString());
    }
    return found;
  }
}
