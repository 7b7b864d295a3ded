import { CustomerId } from "./customer-id.js";

export type CustomerType = "organization" | "individual";

/**
 * Points at exactly one customer record of exactly one kind.
 * Uniqueness checks key on `id` alone; `type` only says where the record lives.
 */
export type CustomerReference =
  | { readonly type: "organization"; readonly id: CustomerId }
  | { readonly type: "individual"; readonly id: CustomerId };

export const createCustomerReference = (type: CustomerType, id: CustomerId): CustomerReference => {
  switch (type) {
    case "organization":
      return { type: "organization", id };
    case "individual":
      return { type: "individual", id };
  }
};

export const isSameCustomer = (a: CustomerReference, b: CustomerReference): boolean =>
  a.id.equals(b.id);
