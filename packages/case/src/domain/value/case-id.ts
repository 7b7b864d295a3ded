import { requireNonEmpty } from "@casekeeper/shared";

export class CaseId {
  private constructor(private readonly value: string) {}

  static create(value: string): CaseId {
    requireNonEmpty(value, "CASE_ID_EMPTY", "CaseId is empty");
    return new CaseId(value);
  }

  static reconstruct(value: string): CaseId {
    return CaseId.create(value);
  }

  equals(other: CaseId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
