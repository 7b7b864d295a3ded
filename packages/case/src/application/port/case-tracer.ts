export type TraceMeta = Record<string, unknown>;

export type CaseTracer = {
  info(message: string, meta?: TraceMeta): void;
  warn(message: string, meta?: TraceMeta): void;
  error(message: string, meta?: TraceMeta): void;
};
