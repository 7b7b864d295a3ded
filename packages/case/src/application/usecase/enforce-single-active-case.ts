import { customerReferenceSchema } from "@casekeeper/shared";
import { ActiveCaseExistsError, CustomerReferenceInvalidError } from "../../domain/case-errors.js";
import { CustomerId } from "../../domain/value/customer-id.js";
import {
  createCustomerReference,
  type CustomerReference
} from "../../domain/value/customer-reference.js";
import type { CaseRepository } from "../port/case-repository.js";
import type { CaseTracer } from "../port/case-tracer.js";

/** Attribute bag of a case that has not been committed yet. */
export type PendingCaseRecord = Readonly<Record<string, unknown>>;

export const CUSTOMER_ATTRIBUTE = "customer";

export type GuardStage = "extracting-reference" | "querying" | "deciding";

export const resolveCustomerReference = (pending: PendingCaseRecord): CustomerReference => {
  const parsed = customerReferenceSchema.safeParse(pending[CUSTOMER_ATTRIBUTE]);
  if (!parsed.success) {
    throw new CustomerReferenceInvalidError();
  }
  return createCustomerReference(parsed.data.type, CustomerId.create(parsed.data.id));
};

/**
 * Rejects a pending case when its customer already has an ACTIVE case.
 *
 * Resolves with the customer reference when the create may proceed. Store
 * failures are rethrown as-is. The check and the later write are not atomic;
 * repositories that can enforce the constraint themselves close that gap.
 */
export class EnforceSingleActiveCase {
  constructor(
    private readonly repository: CaseRepository,
    private readonly tracer: CaseTracer
  ) {}

  async execute(pending: PendingCaseRecord): Promise<CustomerReference> {
    let stage: GuardStage = "extracting-reference";
    try {
      const customer = resolveCustomerReference(pending);
      const customerId = customer.id.toString();

      stage = "querying";
      this.tracer.info("Checking active cases for customer", {
        customerId,
        customerType: customer.type
      });
      const activeCases = await this.repository.findActiveByCustomerId(customer.id, { limit: 1 });

      stage = "deciding";
      if (activeCases.length > 0) {
        this.tracer.warn("Active case found for customer, blocking case creation", { customerId });
        throw new ActiveCaseExistsError(customerId);
      }

      this.tracer.info("No active cases found, case creation allowed", { customerId });
      return customer;
    } catch (error) {
      this.tracer.error("Case uniqueness check failed", {
        stage,
        message: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }
}
