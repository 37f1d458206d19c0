import pino from "pino";

/**
 * Diagnostics go to stderr so stdout stays clean for results.
 * Level from LOG_LEVEL, default "warn".
 */
export const logger = pino(
  { name: "redup", level: process.env["LOG_LEVEL"] ?? "warn" },
  pino.destination(2)
);
