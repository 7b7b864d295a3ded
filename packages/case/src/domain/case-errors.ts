import { DomainError } from "@casekeeper/shared";

export const ACTIVE_CASE_EXISTS_MESSAGE =
  "Cannot create Case. This Customer is linked to another Active Case";

/** Business-rule rejection: the customer already has an open case. */
export class ActiveCaseExistsError extends DomainError {
  constructor(public readonly customerId: string) {
    super("ACTIVE_CASE_EXISTS", ACTIVE_CASE_EXISTS_MESSAGE);
    this.name = "ActiveCaseExistsError";
  }
}

/** Data-integrity failure: the pending case carries no usable customer reference. */
export class CustomerReferenceInvalidError extends DomainError {
  constructor() {
    super("CUSTOMER_REFERENCE_INVALID", "Customer ID is missing or invalid");
    this.name = "CustomerReferenceInvalidError";
  }
}

export class CaseTargetInvalidError extends DomainError {
  constructor() {
    super("CASE_TARGET_INVALID", "Target entity is missing or invalid");
    this.name = "CaseTargetInvalidError";
  }
}

export class CaseNotFoundError extends DomainError {
  constructor(public readonly caseId: string) {
    super("CASE_NOT_FOUND", `Case ${caseId} not found`);
    this.name = "CaseNotFoundError";
  }
}

export class CaseNotActiveError extends DomainError {
  constructor(public readonly caseId: string) {
    super("CASE_NOT_ACTIVE", `Case ${caseId} is not active`);
    this.name = "CaseNotActiveError";
  }
}
