export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return LEVEL_ORDER[configured];
  }

  return LEVEL_ORDER.info;
}

function timestamp(): string {
  return new Date().toISOString();
}

function format(level: LogLevel, message: string): string {
  return `[${timestamp()}] ${level.toUpperCase()} ${message}`;
}

// LOG_LEVEL is read per call so a .env loaded after import still applies.
export const logger = {
  debug(message: string): void {
    if (threshold() <= LEVEL_ORDER.debug) {
      console.debug(format("debug", message));
    }
  },
  info(message: string): void {
    if (threshold() <= LEVEL_ORDER.info) {
      console.log(format("info", message));
    }
  },
  warn(message: string): void {
    if (threshold() <= LEVEL_ORDER.warn) {
      console.warn(format("warn", message));
    }
  },
  error(message: string): void {
    console.error(format("error", message));
  }
};
