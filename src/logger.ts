export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SENSITIVE_KEYS = ["privateKey", "secretKey", "signature", "payload"];

export class Logger {
  private static level: LogLevel = "info";

  static setLevel(level: LogLevel): void {
    Logger.level = level;
  }

  static getLevel(): LogLevel {
    return Logger.level;
  }

  static debug(
    component: string,
    message: string,
    data?: Record<string, unknown>,
  ) {
    if (!Logger.enabled("debug")) return;
    console.debug(`[${component}] ${message}`, Logger.sanitize(data) ?? "");
  }

  static log(component: string, message: string, data?: Record<string, unknown>) {
    if (!Logger.enabled("info")) return;
    console.log(`[${component}] ${message}`, Logger.sanitize(data) ?? "");
  }

  static warn(component: string, message: string, data?: Record<string, unknown>) {
    if (!Logger.enabled("warn")) return;
    console.warn(`[${component}] WARN: ${message}`, Logger.sanitize(data) ?? "");
  }

  static error(component: string, message: string, error?: unknown) {
    if (!Logger.enabled("error")) return;
    console.error(`[${component}] ERROR: ${message}`, error ?? "");
  }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[Logger.level];
  }

  // Remove any sensitive data from logs
  private static sanitize(
    data?: Record<string, unknown>,
  ): Record<string, unknown> | undefined {
    if (!data) return undefined;
    const safeData = { ...data };
    SENSITIVE_KEYS.forEach((key) => delete safeData[key]);
    return safeData;
  }
}

export function truncateId(id: string, length = 16): string {
  return id.length > length ? id.substring(0, length) + "..." : id;
}
