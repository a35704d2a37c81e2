import pino from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "refill-workflow"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to one conversation turn.
 */
export function getTurnLogger(sessionId: string, turnSequence: number) {
  return logger.child({ sessionId, turnSequence });
}
