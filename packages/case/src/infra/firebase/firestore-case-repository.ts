import crypto from "node:crypto";
import { getFirestore } from "firebase-admin/firestore";
import type { Case } from "../../domain/case.js";
import {
  ActiveCaseExistsError,
  CaseNotActiveError,
  CaseNotFoundError
} from "../../domain/case-errors.js";
import { CaseId } from "../../domain/value/case-id.js";
import type { CustomerId } from "../../domain/value/customer-id.js";
import type { CaseRepository, FindActiveCasesOptions } from "../../application/port/case-repository.js";
import { mapCaseFromFirestore, mapCaseToFirestore } from "./case-firestore-mapper.js";

export type FirestoreCaseRepositoryOptions = {
  callerUid: string;
  casesCollection?: string;
  locksCollection?: string;
};

// Customer ids are opaque and may hold "/" or other characters Firestore
// rejects in a document id.
export const activeCaseLockId = (customerId: string): string =>
  crypto.createHash("sha256").update(customerId).digest("hex");

/**
 * Cases live in `cases/{caseId}`. Each customer with an ACTIVE case also owns
 * `activeCaseLocks/{sha256(customerId)}`; the lock is created in the same
 * transaction as the case, so a second concurrent create for that customer
 * cannot commit. Status changes are stamped with the caller as `updatedByUid`.
 */
export class FirestoreCaseRepository implements CaseRepository {
  private readonly callerUid: string;
  private readonly casesCollection: string;
  private readonly locksCollection: string;

  constructor(options: FirestoreCaseRepositoryOptions) {
    this.callerUid = options.callerUid;
    this.casesCollection = options.casesCollection ?? "cases";
    this.locksCollection = options.locksCollection ?? "activeCaseLocks";
  }

  async generateId(): Promise<CaseId> {
    const doc = getFirestore().collection(this.casesCollection).doc();
    return CaseId.create(doc.id);
  }

  async create(entity: Case): Promise<void> {
    const db = getFirestore();
    const caseId = entity.getCaseId().toString();
    const customerId = entity.getCustomer().id.toString();
    const caseRef = db.collection(this.casesCollection).doc(caseId);
    const lockRef = db.collection(this.locksCollection).doc(activeCaseLockId(customerId));

    await db.runTransaction(async (tx) => {
      const lock = await tx.get(lockRef);
      if (lock.exists) {
        throw new ActiveCaseExistsError(customerId);
      }
      tx.create(lockRef, {
        caseId,
        customerId,
        createdAt: entity.getCreatedAt().toDate()
      });
      tx.create(caseRef, mapCaseToFirestore(entity));
    });
  }

  async update(entity: Case): Promise<void> {
    const db = getFirestore();
    const caseId = entity.getCaseId().toString();
    const caseRef = db.collection(this.casesCollection).doc(caseId);
    const lockRef = db
      .collection(this.locksCollection)
      .doc(activeCaseLockId(entity.getCustomer().id.toString()));

    await db.runTransaction(async (tx) => {
      const current = await tx.get(caseRef);
      const lock = await tx.get(lockRef);
      if (!current.exists) {
        throw new CaseNotFoundError(caseId);
      }
      // Only an ACTIVE case may change status; a concurrent change that
      // committed first wins.
      if (!entity.isActive() && current.get("status") !== "ACTIVE") {
        throw new CaseNotActiveError(caseId);
      }
      tx.set(caseRef, { ...mapCaseToFirestore(entity), updatedByUid: this.callerUid }, { merge: true });
      if (!entity.isActive() && lock.exists && lock.get("caseId") === caseId) {
        tx.delete(lockRef);
      }
    });
  }

  async findById(caseId: CaseId): Promise<Case | null> {
    const snapshot = await getFirestore()
      .collection(this.casesCollection)
      .doc(caseId.toString())
      .get();
    if (!snapshot.exists) {
      return null;
    }
    return mapCaseFromFirestore(snapshot.data() ?? {}, snapshot.id);
  }

  async findByCustomerId(customerId: CustomerId): Promise<Case[]> {
    const snapshot = await getFirestore()
      .collection(this.casesCollection)
      .where("customerId", "==", customerId.toString())
      .get();
    return snapshot.docs.map((doc) => mapCaseFromFirestore(doc.data(), doc.id));
  }

  async findActiveByCustomerId(
    customerId: CustomerId,
    options: FindActiveCasesOptions
  ): Promise<Case[]> {
    const snapshot = await getFirestore()
      .collection(this.casesCollection)
      .where("status", "==", "ACTIVE")
      .where("customerId", "==", customerId.toString())
      .limit(options.limit)
      .get();
    return snapshot.docs.map((doc) => mapCaseFromFirestore(doc.data(), doc.id));
  }
}
