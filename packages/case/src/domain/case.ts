import { OccurredAt } from "./value/occurred-at.js";
import { CaseId } from "./value/case-id.js";
import type { CustomerReference } from "./value/customer-reference.js";
import type { CaseStatus } from "./case-status.js";
import { CaseNotActiveError } from "./case-errors.js";

export type CaseCreateParams = {
  caseId: CaseId;
  title: string;
  description: string | null;
  customer: CustomerReference;
  createdByUid: string;
  now: OccurredAt;
};

export type CaseReconstructParams = Omit<CaseCreateParams, "now"> & {
  status: CaseStatus;
  createdAt: OccurredAt;
  updatedAt: OccurredAt;
};

export class Case {
  private constructor(
    private readonly caseId: CaseId,
    private readonly title: string,
    private readonly description: string | null,
    private readonly status: CaseStatus,
    private readonly customer: CustomerReference,
    private readonly createdByUid: string,
    private readonly createdAt: OccurredAt,
    private readonly updatedAt: OccurredAt
  ) {}

  static create(params: CaseCreateParams): Case {
    return new Case(
      params.caseId,
      params.title,
      params.description,
      "ACTIVE",
      params.customer,
      params.createdByUid,
      params.now,
      params.now
    );
  }

  static reconstruct(params: CaseReconstructParams): Case {
    return new Case(
      params.caseId,
      params.title,
      params.description,
      params.status,
      params.customer,
      params.createdByUid,
      params.createdAt,
      params.updatedAt
    );
  }

  resolve(now: OccurredAt): Case {
    return this.leaveActive("RESOLVED", now);
  }

  cancel(now: OccurredAt): Case {
    return this.leaveActive("CANCELLED", now);
  }

  isActive(): boolean {
    return this.status === "ACTIVE";
  }

  getCaseId(): CaseId {
    return this.caseId;
  }

  getTitle(): string {
    return this.title;
  }

  getDescription(): string | null {
    return this.description;
  }

  getStatus(): CaseStatus {
    return this.status;
  }

  getCustomer(): CustomerReference {
    return this.customer;
  }

  getCreatedByUid(): string {
    return this.createdByUid;
  }

  getCreatedAt(): OccurredAt {
    return this.createdAt;
  }

  getUpdatedAt(): OccurredAt {
    return this.updatedAt;
  }

  private leaveActive(status: Exclude<CaseStatus, "ACTIVE">, now: OccurredAt): Case {
    if (!this.isActive()) {
      throw new CaseNotActiveError(this.caseId.toString());
    }
    return new Case(
      this.caseId,
      this.title,
      this.description,
      status,
      this.customer,
      this.createdByUid,
      this.createdAt,
      now
    );
  }
}
