import { Config } from "../config";
import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";
import { Writable } from "stream";

// Logs go to stderr; stdout carries command output such as compiled HTML.
const options: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: stdTimeFunctions.isoTime,
  base: undefined,
  formatters: {
    level: (label) => ({ level: label.toUpperCase() }),
  },
};

type LogRecord = { level?: unknown; time?: unknown; msg?: unknown; file?: unknown };

function field(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function formatLogLine(text: string): string {
  let record: LogRecord | null;
  try {
    record = JSON.parse(text);
  } catch {
    return text + "\n";
  }
  if (typeof record !== "object" || record === null) return text + "\n";
  const time = field(record.time).replace(/\..*/, "");
  const file = field(record.file).slice(0, 9);
  const msg = typeof record.msg === "string" ? record.msg : text;
  return `${field(record.level).padEnd(5)} ${time} ${file.padEnd(10)} ${msg}\n`;
}

function build(): Logger {
  if (Config.LOG_FORMAT === "simple") {
    const lines = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        const text = chunk.toString("utf8").trim();
        if (text.length > 0) process.stderr.write(formatLogLine(text));
        callback();
      },
    });
    return pino(options, lines);
  }
  return pino(options, pino.destination({ dest: 2, sync: true }));
}

type GlobalWithLogger = typeof globalThis & { __AGM_LOGGER__?: Logger };
const g = globalThis as GlobalWithLogger;

export const logger: Logger = g.__AGM_LOGGER__ ?? (g.__AGM_LOGGER__ = build());
export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);
