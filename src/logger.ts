// One JSON line per event through the console. Threshold from DATESIFT_LOG_LEVEL.

import { env, type LogLevel } from "./config";

type Fields = Record<string, unknown>;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = env.LOG_LEVEL;

/** Override the level read from the environment (tests, embedding apps). */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function logDebug(msg: string, obj: Fields = {}): void {
  if (RANK.debug >= RANK[threshold]) console.debug(JSON.stringify({ level: "debug", msg, ...obj }));
}
