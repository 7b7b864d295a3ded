export * from "./error/domain-error.js";
export * from "./util/guard.js";
export * from "./validation/case-schema.js";
