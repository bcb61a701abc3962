// src/logger.ts
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export type Logger = {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  isDebug(): boolean;
};

function render(data: unknown): string {
  if (data === undefined) return "";
  if (data instanceof Error) return ` ${data.name}: ${data.message}`;
  try {
    return " " + JSON.stringify(data);
  } catch {
    return " " + String(data);
  }
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown) => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold]) return;
    const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${scope}] ${message}${render(data)}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  };

  return {
    debug: (m, d) => write("debug", m, d),
    info: (m, d) => write("info", m, d),
    warn: (m, d) => write("warn", m, d),
    error: (m, d) => write("error", m, d),
    isDebug: () => threshold === "debug",
  };
}

export function redact(s?: string) {
  if (!s) return "(none)";
  if (s.length <= 8) return "***";
  return `${s.slice(0, 3)}***${s.slice(-3)}`;
}

export function redactHeaders(headers: Record<string, string>) {
  const out: Record<string, string> = { ...headers };
  const k = Object.keys(out).find((x) => x.toLowerCase() === "authorization");
  if (k && out[k]) out[k] = out[k].replace(/Bearer\s+.*/i, "Bearer ***");
  return out;
}
