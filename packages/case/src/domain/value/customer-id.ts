import { requireNonEmpty } from "@casekeeper/shared";

export class CustomerId {
  private constructor(private readonly value: string) {}

  static create(value: string): CustomerId {
    requireNonEmpty(value, "CUSTOMER_ID_EMPTY", "CustomerId is empty");
    return new CustomerId(value.trim());
  }

  static reconstruct(value: string): CustomerId {
    return CustomerId.create(value);
  }

  equals(other: CustomerId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
