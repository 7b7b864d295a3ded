import {
  ActiveCaseExistsError,
  CaseId,
  CaseNotActiveError,
  CaseNotFoundError,
  type Case,
  type CaseRepository,
  type CustomerId,
  type FindActiveCasesOptions
} from "@casekeeper/case";

export class InMemoryCaseRepository implements CaseRepository {
  private records = new Map<string, Case>();
  private activeIndex = new Map<string, string>();
  private sequence = 0;

  async generateId(): Promise<CaseId> {
    this.sequence += 1;
    return CaseId.create(`case-${this.sequence}`);
  }

  async create(entity: Case): Promise<void> {
    const caseId = entity.getCaseId().toString();
    const customerId = entity.getCustomer().id.toString();
    if (entity.isActive() && this.activeIndex.has(customerId)) {
      throw new ActiveCaseExistsError(customerId);
    }
    this.records.set(caseId, entity);
    if (entity.isActive()) {
      this.activeIndex.set(customerId, caseId);
    }
  }

  async update(entity: Case): Promise<void> {
    const caseId = entity.getCaseId().toString();
    const customerId = entity.getCustomer().id.toString();
    const current = this.records.get(caseId);
    if (!current) {
      throw new CaseNotFoundError(caseId);
    }
    if (!entity.isActive() && !current.isActive()) {
      throw new CaseNotActiveError(caseId);
    }
    this.records.set(caseId, entity);
    if (!entity.isActive() && this.activeIndex.get(customerId) === caseId) {
      this.activeIndex.delete(customerId);
    }
  }

  async findById(caseId: CaseId): Promise<Case | null> {
    return this.records.get(caseId.toString()) ?? null;
  }

  async findByCustomerId(customerId: CustomerId): Promise<Case[]> {
    return Array.from(this.records.values()).filter((entity) =>
      entity.getCustomer().id.equals(customerId)
    );
  }

  async findActiveByCustomerId(
    customerId: CustomerId,
    options: FindActiveCasesOptions
  ): Promise<Case[]> {
    const cases = await this.findByCustomerId(customerId);
    return cases.filter((entity) => entity.isActive()).slice(0, options.limit);
  }
}
