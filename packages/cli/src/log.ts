export const levels = ["error", "warn", "info", "debug"] as const;

export type Level = (typeof levels)[number];

const isLevel = (s: string | undefined): s is Level =>
  levels.some((level) => level === s);

const fromEnv = process.env.LOG_LEVEL;

let current: Level = isLevel(fromEnv) ? fromEnv : "info";

export const setLogLevel = (level: Level): void => {
  current = level;
};

export const getLogLevel = (): Level => current;

const enabled = (level: Level) =>
  levels.indexOf(level) <= levels.indexOf(current);

const write = (level: Level, msg: string) => {
  if (!enabled(level)) return;
  // stdout is reserved for results
  console.error(`${new Date().toISOString()} ${level.padEnd(5)} ${msg}`);
};

export const log = {
  error: (msg: string) => write("error", msg),
  warn: (msg: string) => write("warn", msg),
  info: (msg: string) => write("info", msg),
  debug: (msg: string) => write("debug", msg),
};
