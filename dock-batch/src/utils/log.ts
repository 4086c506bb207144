/* eslint-disable no-console */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function createLogger(scope: string, opts: { level?: LogLevel } = {}): Logger {
  const level = opts.level ?? "info";
  const enabled = (l: LogLevel) => ORDER[l] >= ORDER[level];
  const tag = `[${scope}]`;
  return {
    debug: (m) => { if (enabled("debug")) console.debug(`${tag} ${m}`); },
    info: (m) => { if (enabled("info")) console.log(`${tag} ${m}`); },
    warn: (m) => { if (enabled("warn")) console.warn(`${tag} ${m}`); },
    error: (m) => { if (enabled("error")) console.error(`${tag} ${m}`); },
    child: (sub) => createLogger(`${scope}:${sub}`, { level }),
  };
}

export const silentLogger: Logger = createLogger("silent", { level: "silent" });
