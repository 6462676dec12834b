//shardcore/utils/logger.ts

import { Colors, colorize, ColorCode } from "./colors";
import { LogLevel, logEnabled } from "../config/logconfig";

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

function levelColor(level: LogLevel): ColorCode {
  switch (level) {
    case "debug":
      return Colors.BrightCyan;
    case "info":
      return Colors.FgGreen;
    case "warn":
      return Colors.FgYellow;
    case "error":
    default:
      return Colors.FgRed;
  }
}

function formatValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      error: value.message,
      name: value.name,
      stack: value.stack,
    };
  }
  return value;
}

// Error values nested one level down in a meta object get the same treatment,
// so `log.warn("x", { shardId, err })` prints a readable error.
function formatMeta(value: unknown): unknown {
  if (value !== null && typeof value === "object" && !(value instanceof Error) && !Array.isArray(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = formatValue(v);
    }
    return out;
  }
  return formatValue(value);
}

export class Logger {
  private constructor(private readonly scopeName: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  /** Sub-scope sharing the parent's level, e.g. `SHARD` -> `SHARD:3`. */
  child(suffix: string): Logger {
    return new Logger(`${this.scopeName}:${suffix}`.toUpperCase());
  }

  enabled(level: LogLevel): boolean {
    return logEnabled(this.rootScope(), level);
  }

  private rootScope(): string {
    const idx = this.scopeName.indexOf(":");
    return idx === -1 ? this.scopeName : this.scopeName.slice(0, idx);
  }

  private write(level: LogLevel, color: ColorCode, message: string, meta: unknown[]): void {
    if (!this.enabled(level)) return;

    const tag = colorize(`[${this.scopeName}:${level.toUpperCase()}]`, color);
    const line = `${timestamp()} ${tag} ${message}`;

    if (meta.length === 0) {
      console.log(line);
    } else {
      console.log(line, ...meta.map(formatMeta));
    }
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write("debug", levelColor("debug"), message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write("info", levelColor("info"), message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write("warn", levelColor("warn"), message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write("error", levelColor("error"), message, meta);
  }

  // Convenience alias: logs at info level but with bright green tag
  success(message: string, ...meta: unknown[]): void {
    this.write("info", Colors.BrightGreen, message, meta);
  }
}
