import { describe, it, expect, vi, beforeEach } from "vitest";
import { FirestoreCaseRepository } from "@casekeeper/case";
import { assertApiDeps, createDefaultDeps, HostConfigurationError } from "./deps.js";

const { verifyIdToken } = vi.hoisted(() => ({ verifyIdToken: vi.fn() }));

vi.mock("firebase-admin/auth", () => ({
  getAuth: () => ({ verifyIdToken })
}));

const validDeps = () => ({
  caseRepoFor: () => null,
  now: () => new Date(),
  getAuthUser: async () => ({ uid: "u1" }),
  logger: { info: () => undefined, warn: () => undefined, error: () => undefined }
});

describe("createDefaultDeps", () => {
  beforeEach(() => {
    verifyIdToken.mockReset();
  });

  it("provides a caller-scoped firestore case repository", () => {
    const deps = createDefaultDeps();
    expect(deps.caseRepoFor("uid_1")).toBeInstanceOf(FirestoreCaseRepository);
    expect(() => assertApiDeps(deps)).not.toThrow();
  });

  it("rejects requests without a bearer token", async () => {
    const deps = createDefaultDeps();
    await expect(deps.getAuthUser(undefined)).rejects.toThrow("UNAUTHORIZED");
    expect(verifyIdToken).not.toHaveBeenCalled();
  });

  it("maps auth errors to UNAUTHORIZED and keeps other failures", async () => {
    const deps = createDefaultDeps();
    verifyIdToken.mockRejectedValueOnce(
      Object.assign(new Error("expired"), { code: "auth/id-token-expired" })
    );
    await expect(deps.getAuthUser("Bearer token_1")).rejects.toThrow("UNAUTHORIZED");

    const outage = new Error("network down");
    verifyIdToken.mockRejectedValueOnce(outage);
    await expect(deps.getAuthUser("Bearer token_1")).rejects.toBe(outage);
  });

  it("returns the verified user", async () => {
    verifyIdToken.mockResolvedValueOnce({ uid: "uid_9", email: "agent@example.com" });
    const deps = createDefaultDeps();
    await expect(deps.getAuthUser("Bearer token_9")).resolves.toEqual({
      uid: "uid_9",
      email: "agent@example.com"
    });
    expect(verifyIdToken).toHaveBeenCalledWith("token_9");
  });
});

describe("assertApiDeps", () => {
  it("reports a missing service", () => {
    expect(() => assertApiDeps({ ...validDeps(), caseRepoFor: undefined })).toThrow(
      new HostConfigurationError("Case repository factory unavailable")
    );
    expect(() => assertApiDeps({})).toThrow("Case repository factory unavailable");
  });

  it("reports a service of the wrong type", () => {
    expect(() => assertApiDeps({ ...validDeps(), now: "2024-01-01" })).toThrow(
      "Clock is not of the expected type"
    );
    expect(() => assertApiDeps({ ...validDeps(), logger: { info: () => undefined } })).toThrow(
      "Tracing service is not of the expected type"
    );
  });

  it("throws HostConfigurationError", () => {
    expect(() => assertApiDeps({ ...validDeps(), getAuthUser: null })).toThrow(
      HostConfigurationError
    );
  });
});
