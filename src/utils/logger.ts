import { LOG_LEVEL } from "../config";

type Level = "debug" | "info" | "warn" | "error";

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLevel(v: string): v is Level {
  return v in levelOrder;
}

const threshold: Level = isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";

function log(level: Level, msg: string, extra?: Record<string, unknown>) {
  if (levelOrder[level] < levelOrder[threshold]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    msg,
    ...extra,
  };
  // eslint-disable-next-line no-console
  (level === "error" ? console.error : console.log)(JSON.stringify(payload));
}

export const logger = {
  debug: (msg: string, extra?: Record<string, unknown>) => log("debug", msg, extra),
  info: (msg: string, extra?: Record<string, unknown>) => log("info", msg, extra),
  warn: (msg: string, extra?: Record<string, unknown>) => log("warn", msg, extra),
  error: (msg: string, extra?: Record<string, unknown>) => log("error", msg, extra),
};
