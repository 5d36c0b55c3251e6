import fs from "fs";
import path from "path";
import { cfg, type LogLevel } from "./config.js";

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

const configuredLevel = cfg.log.level;
const minLevel = LEVELS[configuredLevel];
const consoleEnabled = cfg.log.console;
const logFile = cfg.log.file;

let stream: fs.WriteStream | null = null;

function ensureStream() {
  if (!logFile) return null;
  if (stream) return stream;
  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
  } catch (e) {
    console.error('[logger] failed to create log directory', e);
  }
  try {
    const header = `# gh-repo-bridge log (level=${configuredLevel}) started ${new Date().toISOString()}\n`;
    try {
      fs.appendFileSync(logFile, header);
    } catch (e) {
      console.error('[logger] failed to write log header', e);
    }
    stream = fs.createWriteStream(logFile, { flags: "a" });

    stream.on('error', (err) => {
      console.error('[logger] write stream error', err);
      stream?.end();
      stream = null;
    });
  } catch (e) {
    console.error("[logger] failed to create log file stream", e);
    stream = null;
  }
  return stream;
}

export function getLogFilePath() {
  return logFile;
}

export function isFileLoggingActive() {
  return !!stream;
}

export function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    const base: Record<string, unknown> = {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) base[key] = serialize(v);
    }
    return base;
  }
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  if (!value || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(serialize);
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = serialize(v);
  }
  return out;
}

function write(level: Level, scope: string | undefined, message: string, meta?: unknown) {
  if (LEVELS[level] > minLevel) return;
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    msg: message
  };
  if (scope) entry.scope = scope;
  if (meta !== undefined) entry.meta = serialize(meta);

  const line = JSON.stringify(entry);
  if (consoleEnabled) {
    const consoleMethod = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    const prefix = scope ? `[${level}] [${scope}]` : `[${level}]`;
    if (entry.meta !== undefined) {
      consoleMethod(`${prefix} ${message}`, entry.meta);
    } else {
      consoleMethod(`${prefix} ${message}`);
    }
  }
  const s = ensureStream();
  if (s) {
    s.write(line + "\n");
  }
}

type Level = LogLevel;

export type Logger = {
  [L in Level]: (message: string, meta?: unknown) => void;
};

export function createLogger(scope?: string): Logger {
  return {
    error(message, meta) { write("error", scope, message, meta); },
    warn(message, meta) { write("warn", scope, message, meta); },
    info(message, meta) { write("info", scope, message, meta); },
    debug(message, meta) { write("debug", scope, message, meta); },
    trace(message, meta) { write("trace", scope, message, meta); }
  };
}

export const logger = createLogger();

if (logFile) {
  ensureStream();
  if (consoleEnabled) {
    console.log(`[logger] writing to ${logFile} at level ${configuredLevel}`);
  }
}
