import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

const LEVELS = new Set(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export function resolveLogLevel(raw: string | undefined): string {
  const level = (raw ?? "").trim().toLowerCase();
  return LEVELS.has(level) ? level : "info";
}

export function createLogger(
  opts: { level?: string; pretty?: boolean; env?: Record<string, string | undefined> } = {},
): Logger {
  const env = opts.env ?? process.env;
  const options: LoggerOptions = {
    level: resolveLogLevel(opts.level ?? env.LOG_LEVEL),
    base: { service: "tubechat" },
  };

  // JSON lines unless someone is watching the terminal.
  const pretty = opts.pretty ?? (Boolean(process.stdout.isTTY) && env.LOG_FORMAT !== "json");
  if (pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:HH:MM:ss",
        ignore: "pid,hostname,service",
      },
    };
  }

  return pino(options);
}

export const logger: Logger = createLogger();

/** Re-read LOG_LEVEL, e.g. once `.env` has been loaded after this module. */
export function applyLogLevel(target: Logger = logger, env: Record<string, string | undefined> = process.env): void {
  target.level = resolveLogLevel(env.LOG_LEVEL);
}
