import { Logger, type ILogObj } from "tslog";

/** The subset of logger methods components call; any tslog sub-logger fits. */
export type KeystoreLogger = Pick<Logger<ILogObj>, "debug" | "info" | "warn">;

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveLogType(value: string | undefined): "pretty" | "json" | "hidden" {
  return value === "json" || value === "hidden" ? value : "pretty";
}

export function createSubsystemLogger(name: string): Logger<ILogObj> {
  return new Logger<ILogObj>({
    name,
    type: resolveLogType(process.env.ACCTKIT_LOG_TYPE),
    minLevel: LEVELS[process.env.ACCTKIT_LOG_LEVEL ?? ""] ?? LEVELS.info,
  });
}
