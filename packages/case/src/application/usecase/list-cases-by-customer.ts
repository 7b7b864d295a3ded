import type { Case } from "../../domain/case.js";
import { CustomerId } from "../../domain/value/customer-id.js";
import type { CaseRepository } from "../port/case-repository.js";

export class ListCasesByCustomer {
  constructor(private readonly repository: CaseRepository) {}

  async execute(customerId: CustomerId): Promise<Case[]> {
    const cases = await this.repository.findByCustomerId(customerId);
    return [...cases].sort(
      (a, b) => b.getCreatedAt().toDate().getTime() - a.getCreatedAt().toDate().getTime()
    );
  }
}
