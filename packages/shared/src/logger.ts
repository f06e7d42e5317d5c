export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (!raw) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

function stdoutSink(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? parseLogLevel(process.env.LOG_LEVEL)];
  const sink = options.sink ?? stdoutSink;

  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    const event = {
      ts: new Date().toISOString(),
      level,
      message,
      service,
      ...(fields ?? {})
    };
    sink(JSON.stringify(event));
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields)
  };
}
