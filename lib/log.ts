// lib/log.ts

// safe log head/tail
export const short = (s: string, n = 900) =>
  (s || "").slice(0, n) + ((s || "").length > n ? " …[truncated]" : "");

export const newRequestId = () => Math.random().toString(36).slice(2, 8);

export type Logger = {
  info: (msg: string, ...extra: unknown[]) => void;
  warn: (msg: string, ...extra: unknown[]) => void;
  error: (msg: string, ...extra: unknown[]) => void;
};

/** console logger with a `[scope reqId]` prefix, as seen in the function logs */
export function scopedLogger(scope: string, reqId: string = newRequestId()): Logger {
  const tag = `[${scope} ${reqId}]`;
  return {
    info: (msg, ...extra) => console.log(`${tag} ${msg}`, ...extra),
    warn: (msg, ...extra) => console.warn(`${tag} ${msg}`, ...extra),
    error: (msg, ...extra) => console.error(`${tag} ${msg}`, ...extra),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
