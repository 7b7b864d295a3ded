import { describe, it, expect } from "vitest";
import { mapCaseFromFirestore, mapCaseToFirestore } from "./case-firestore-mapper.js";

describe("mapCaseFromFirestore", () => {
  it("maps firestore data to Case", () => {
    const entity = mapCaseFromFirestore(
      {
        caseId: "case_1",
        title: "Printer offline",
        description: null,
        status: "RESOLVED",
        customerId: "org_1",
        customerType: "organization",
        createdByUid: "uid_1",
        createdAt: { toDate: () => new Date("2024-01-01T00:00:00.000Z") },
        updatedAt: "2024-01-02T00:00:00.000Z"
      },
      "case_1"
    );

    expect(entity.getStatus()).toBe("RESOLVED");
    expect(entity.getCustomer().type).toBe("organization");
    expect(entity.getCustomer().id.toString()).toBe("org_1");
    expect(entity.getCreatedAt().toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(entity.getUpdatedAt().toISOString()).toBe("2024-01-02T00:00:00.000Z");
  });

  it("falls back to the document id", () => {
    const entity = mapCaseFromFirestore(
      {
        title: "Invoice",
        status: "ACTIVE",
        customerId: "person_1",
        customerType: "individual",
        createdAt: new Date("2024-01-01T00:00:00.000Z"),
        updatedAt: new Date("2024-01-01T00:00:00.000Z")
      },
      "doc_7"
    );

    expect(entity.getCaseId().toString()).toBe("doc_7");
    expect(entity.getDescription()).toBeNull();
    expect(entity.getCreatedByUid()).toBe("");
  });

  it("rejects unknown statuses", () => {
    expect(() =>
      mapCaseFromFirestore(
        { title: "x", status: "OPEN", customerId: "c", customerType: "organization" },
        "doc_1"
      )
    ).toThrow("Stored case doc_1 is invalid");
  });

  it("round-trips through mapCaseToFirestore", () => {
    const entity = mapCaseFromFirestore(
      {
        title: "Invoice",
        description: "Duplicate charge",
        status: "ACTIVE",
        customerId: "person_1",
        customerType: "individual",
        createdByUid: "uid_2",
        createdAt: new Date("2024-01-01T00:00:00.000Z"),
        updatedAt: new Date("2024-01-01T00:00:00.000Z")
      },
      "case_9"
    );

    expect(mapCaseToFirestore(entity)).toEqual({
      caseId: "case_9",
      title: "Invoice",
      description: "Duplicate charge",
      status: "ACTIVE",
      customerId: "person_1",
      customerType: "individual",
      createdByUid: "uid_2",
      createdAt: new Date("2024-01-01T00:00:00.000Z"),
      updatedAt: new Date("2024-01-01T00:00:00.000Z")
    });
  });
});
