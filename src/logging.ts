import { Logger, type ILogObj } from "tslog";

export type BotLogger = Logger<ILogObj>;

const LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

type LevelName = keyof typeof LEVELS;

function isLevelName(value: string): value is LevelName {
  return Object.hasOwn(LEVELS, value);
}

export function createRootLogger(env: NodeJS.ProcessEnv = process.env): BotLogger {
  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase() ?? "info";
  const silent = rawLevel === "silent";
  const minLevel = isLevelName(rawLevel) ? LEVELS[rawLevel] : LEVELS.info;
  const type = silent ? "hidden" : env.LOG_FORMAT?.trim() === "json" ? "json" : "pretty";
  return new Logger<ILogObj>({ name: "feed-digest", minLevel, type });
}

let rootLogger: BotLogger | null = null;

export function getLogger(): BotLogger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

export function getChildLogger(bindings: { module: string }): BotLogger {
  return getLogger().getSubLogger({ name: bindings.module });
}
