type Scope = "Main" | "Cli" | "Resolver" | "Socket";

type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// stdout belongs to the result line, so nothing is printed unless asked for.
let current: LogLevel = "silent";

function ts(): string {
  const d = new Date();
  const iso = d.toISOString();
  return iso.substring(11, 23); // HH:MM:SS.mmm
}

function stringify(meta?: unknown): string {
  if (meta === undefined || meta === null) {
    return "";
  }
  try {
    if (typeof meta === "string") {
      return meta;
    }
    if (meta instanceof Error) {
      return JSON.stringify({ name: meta.name, message: meta.message });
    }
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}

function write(level: LogLevel, scope: Scope, msg: string, meta?: unknown): void {
  if (LEVELS[level] < LEVELS[current]) {
    return;
  }
  const extra = stringify(meta);
  const line = `[${ts()}][${scope}] ${msg}`;
  console.error(extra ? `${line} ${extra}` : line);
}

export function setLogLevel(level: LogLevel): void {
  current = level;
}

export function getLogLevel(): LogLevel {
  return current;
}

export const log = {
  debug(scope: Scope, msg: string, meta?: unknown): void {
    write("debug", scope, msg, meta);
  },
  info(scope: Scope, msg: string, meta?: unknown): void {
    write("info", scope, msg, meta);
  },
  warn(scope: Scope, msg: string, meta?: unknown): void {
    write("warn", scope, msg, meta);
  },
  error(scope: Scope, msg: string, meta?: unknown): void {
    write("error", scope, msg, meta);
  },
};

export type { Scope, LogLevel };
