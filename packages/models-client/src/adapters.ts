// ---------- Abstractions ----------
export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
};

export type FetchFn = typeof fetch;

// ---------- Default adapters ----------
export const consoleLogger: Logger = {
  debug: (msg, meta) => console.debug("[DEBUG]", msg, meta ?? ""),
  info: (msg, meta) => console.log("[INFO]", msg, meta ?? ""),
  warn: (msg, meta) => console.warn("[WARN]", msg, meta ?? ""),
  error: (msg, meta) => console.error("[ERROR]", msg, meta ?? ""),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
