export * from "./domain/case.js";
export * from "./domain/case-status.js";
export * from "./domain/case-errors.js";
export * from "./domain/value/case-id.js";
export * from "./domain/value/customer-id.js";
export * from "./domain/value/customer-reference.js";
export * from "./domain/value/occurred-at.js";
export * from "./application/port/case-repository.js";
export * from "./application/port/case-tracer.js";
export * from "./application/usecase/enforce-single-active-case.js";
export * from "./application/usecase/create-case.js";
export * from "./application/usecase/change-case-status.js";
export * from "./application/usecase/get-case.js";
export * from "./application/usecase/list-cases-by-customer.js";
export * from "./infra/firebase/case-firestore-mapper.js";
export * from "./infra/firebase/firestore-case-repository.js";
