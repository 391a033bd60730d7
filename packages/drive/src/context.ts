import type { DriveConfig } from "@mailstash/shared";
import type { Logger } from "./logger.js";
import type { MailTransport } from "./transport/types.js";

/**
 * Everything an operation needs, passed explicitly. Scoped to one CLI
 * invocation: the transport is connected at start and closed on exit.
 */
export interface DriveContext {
  transport: MailTransport;
  config: DriveConfig;
  logger: Logger;
}
