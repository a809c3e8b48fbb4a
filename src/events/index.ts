export { EventLogger } from "./logger.js";
export type { EventCallback, EventLoggerOptions, LogEventInput } from "./logger.js";
