import chalk from "chalk";

export type LogLevel = "debug" | "info" | "error";
export type LogFields = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, fields?: LogFields) => void;
  info: (msg: string, fields?: LogFields) => void;
  error: (msg: string, fields?: LogFields) => void;
};

export type LogSink = { write(chunk: string): unknown };

const levels: Record<LogLevel, number> = { debug: 10, info: 20, error: 40 };

export function formatValue(value: unknown): string {
  if (typeof value === "string") {
    if (value === "") return '""';
    if (/\s/.test(value) || value.includes("=") || value.includes("\"")) {
      return JSON.stringify(value);
    }
    return value;
  }
  if (value === null || value === undefined) return "null";
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

export function createLogger(json: boolean, level: LogLevel, stream: LogSink, color: boolean): Logger {
  const min = levels[level];
  const useColor = color && !json;
  const levelColor = (lv: LogLevel, value: string) => {
    if (!useColor) return value;
    return lv === "error" ? chalk.red(value) : lv === "debug" ? chalk.cyan(value) : chalk.green(value);
  };
  const keyColor = (value: string) => (useColor ? chalk.blue(value) : value);
  const msgColor = (value: string) => (useColor ? chalk.green(value) : value);
  const valueColor = (value: string) => (useColor ? chalk.dim(value) : value);

  function write(lv: LogLevel, msg: string, fields?: LogFields) {
    if (levels[lv] < min) return;
    const time = new Date().toISOString();
    if (json) {
      const payload: LogFields = { time, level: lv.toUpperCase(), msg };
      if (fields) for (const [k, v] of Object.entries(fields)) payload[k] = v;
      stream.write(`${JSON.stringify(payload)}\n`);
      return;
    }
    const parts = [
      `${keyColor("time")}=${valueColor(time)}`,
      `${keyColor("level")}=${levelColor(lv, lv.toUpperCase())}`,
      `${keyColor("msg")}=${msgColor(msg)}`,
    ];
    if (fields) {
      for (const [k, v] of Object.entries(fields)) {
        parts.push(`${keyColor(k)}=${valueColor(formatValue(v))}`);
      }
    }
    stream.write(parts.join(" ") + "\n");
  }

  return {
    debug: (msg, fields) => write("debug", msg, fields),
    info: (msg, fields) => write("info", msg, fields),
    error: (msg, fields) => write("error", msg, fields),
  };
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const lv = String(raw || "info").toLowerCase();
  if (lv === "debug" || lv === "error" || lv === "info") return lv;
  return "info";
}

let current = createLogger(false, "info", process.stderr, Boolean(process.stderr.isTTY));

export function setLoggerConfig(json: boolean, level: LogLevel, stream: LogSink = process.stderr) {
  const useColor = stream === process.stderr && Boolean(process.stderr.isTTY) && !json;
  current = createLogger(json, level, stream, useColor);
}

// Stable facade so modules can import `logger` once and still see reconfiguration.
export const logger: Logger = {
  debug: (msg, fields) => current.debug(msg, fields),
  info: (msg, fields) => current.info(msg, fields),
  error: (msg, fields) => current.error(msg, fields),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
