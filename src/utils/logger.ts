/**
 * Structured Logger
 *
 * Console wrapper with ISO timestamps, level prefixes and a namespace per
 * subsystem ("[bot]", "[store]", "[broadcast]", ...).
 */

function fmt(level: string, ns: string, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const extra = data ? " " + JSON.stringify(data) : "";
  return `${ts} ${level} ${ns} ${msg}${extra}`;
}

export function extractError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

export const log = {
  info(ns: string, msg: string, data?: Record<string, unknown>) {
    console.log(fmt("INFO", ns, msg, data));
  },
  warn(ns: string, msg: string, data?: Record<string, unknown>) {
    console.warn(fmt("WARN", ns, msg, data));
  },
  error(ns: string, msg: string, data?: Record<string, unknown>) {
    console.error(fmt("ERROR", ns, msg, data));
  },
  debug(ns: string, msg: string, data?: Record<string, unknown>) {
    if (process.env.DEBUG) {
      console.debug(fmt("DEBUG", ns, msg, data));
    }
  },
};

/**
 * Run a promise in the background; a rejection is logged as a warning under
 * the caller's namespace.
 *
 * Usage: fireAndForget(store.setUserActive(id, false), "[bot]", "Deactivate blocked user", { telegramId })
 */
export function fireAndForget(
  promise: Promise<unknown>,
  ns: string,
  context: string,
  data?: Record<string, unknown>,
): void {
  promise.catch((err) => log.warn(ns, context, { ...data, error: extractError(err) }));
}
