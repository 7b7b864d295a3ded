import { DomainError } from "@casekeeper/shared";

export class OccurredAt {
  private constructor(private readonly value: Date) {}

  static create(value: Date): OccurredAt {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new DomainError("OCCURRED_AT_INVALID", "OccurredAt is invalid");
    }
    return new OccurredAt(new Date(value.getTime()));
  }

  static reconstruct(value: string): OccurredAt {
    return OccurredAt.create(new Date(value));
  }

  toDate(): Date {
    return new Date(this.value.getTime());
  }

  toISOString(): string {
    return this.value.toISOString();
  }
}
