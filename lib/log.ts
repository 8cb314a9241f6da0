/**
 * Console logging with named loggers and a level threshold.
 *
 * Line format: `<ISO timestamp> - <name> - <LEVEL> - <message>`
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(name: string): Logger;
};

/**
 * Where formatted lines go. Defaults to the console; tests pass a collector.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(
  name: string,
  options: { level?: LogLevel; sink?: LogSink; now?: () => Date } = {},
): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  const write = (level: LogLevel, message: string) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    sink(
      level,
      `${now().toISOString()} - ${name} - ${level.toUpperCase()} - ${message}`,
    );
  };

  return {
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
    child: (sub) => createLogger(`${name}.${sub}`, options),
  };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = createLogger("silent", {
  sink: () => undefined,
});
