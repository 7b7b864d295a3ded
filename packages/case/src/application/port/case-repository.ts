import type { Case } from "../../domain/case.js";
import type { CaseId } from "../../domain/value/case-id.js";
import type { CustomerId } from "../../domain/value/customer-id.js";

export type FindActiveCasesOptions = {
  limit: number;
};

export interface CaseRepository {
  generateId(): Promise<CaseId>;
  /**
   * Persists a new case. Implementations that can enforce the one-active-case
   * constraint themselves reject a conflicting write with `ActiveCaseExistsError`.
   */
  create(entity: Case): Promise<void>;
  update(entity: Case): Promise<void>;
  findById(caseId: CaseId): Promise<Case | null>;
  findByCustomerId(customerId: CustomerId): Promise<Case[]>;
  findActiveByCustomerId(customerId: CustomerId, options: FindActiveCasesOptions): Promise<Case[]>;
}

/** Builds a repository scoped to the calling user. */
export type CaseRepositoryFactory = (callerUid: string) => CaseRepository;
