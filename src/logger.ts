import { LoggerImpl, type Logger } from "@adviser/cement";

export type { Logger };

/** Module-scoped child of `logger`, or of a fresh default logger. */
export function ensureModuleLogger(module: string, logger?: Logger): Logger {
  return (logger ?? new LoggerImpl()).With().Module(module).Logger();
}
