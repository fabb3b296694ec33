import type { ILogObj, Logger } from "tslog";

export { createSubsystemLogger } from "@acctkit/keystore";

export type SubsystemLogger = Pick<Logger<ILogObj>, "debug" | "info" | "warn">;
