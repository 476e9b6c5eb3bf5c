import { createConsola, type LogObject } from 'consola';
import fs from 'node:fs';
import path from 'node:path';

/**
 * Central logger module for the broker.
 *
 * Provides a singleton logger backed by consola. Before `initLogger()` is called,
 * the logger outputs to console only at info level. When `initLogger()` is given a
 * log directory, it also appends structured NDJSON entries to `a2a-broker.log`
 * there, rotating the file once it exceeds the size limit.
 *
 * @module broker/lib/logger
 */

const LOG_FILE_NAME = 'a2a-broker.log';
const DEFAULT_MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB
const DEFAULT_MAX_LOG_FILES = 7;

/**
 * Create an NDJSON file reporter that appends structured log entries to disk.
 *
 * Plain-object arguments are merged into the entry as structured context;
 * everything else is joined into `msg`.
 */
function createFileReporter(logFile: string) {
  return {
    log(logObj: LogObject) {
      let context: Record<string, unknown> = {};
      const msgParts: string[] = [];
      for (const arg of logObj.args) {
        if (isPlainRecord(arg)) {
          context = { ...context, ...arg };
        } else {
          msgParts.push(String(arg));
        }
      }

      const entry = JSON.stringify({
        level: logObj.type,
        time: logObj.date.toISOString(),
        msg: msgParts.join(' '),
        tag: logObj.tag || undefined,
        ...context,
      });
      fs.appendFileSync(logFile, entry + '\n');
    },
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Rotate the log file once it exceeds `maxLogSize`, keeping the newest
 * `maxLogFiles` rotated files. Errors are ignored so startup never fails on rotation.
 */
function rotateIfNeeded(logDir: string, maxLogSize: number, maxLogFiles: number): void {
  const logFile = path.join(logDir, LOG_FILE_NAME);
  try {
    const stat = fs.statSync(logFile);
    if (stat.size <= maxLogSize) return;

    const date = new Date().toISOString().slice(0, 10);
    fs.renameSync(logFile, path.join(logDir, `a2a-broker-${date}-${Date.now()}.log`));

    const rotated = fs
      .readdirSync(logDir)
      .filter((f) => f.startsWith('a2a-broker-') && f.endsWith('.log'))
      .sort()
      .reverse();
    for (const old of rotated.slice(maxLogFiles)) {
      fs.unlinkSync(path.join(logDir, old));
    }
  } catch {
    // File doesn't exist yet or rotation failed — continue
  }
}

/** Default logger instance (console-only until initLogger is called). */
export let logger = createConsola({
  level: 3, // info
});

/**
 * Initialize the logger with the configured level and, optionally, file persistence.
 * Call once at startup after config is loaded.
 *
 * @param options.level - Numeric log level (0=fatal … 5=trace). Defaults to 3 (info).
 * @param options.logDir - Directory for `a2a-broker.log`. Console-only when omitted.
 */
export function initLogger(options?: {
  level?: number;
  logDir?: string | null;
  maxLogSize?: number;
  maxLogFiles?: number;
}): void {
  logger = createConsola({ level: options?.level ?? 3 });

  const logDir = options?.logDir;
  if (!logDir) return;

  fs.mkdirSync(logDir, { recursive: true });
  rotateIfNeeded(
    logDir,
    options?.maxLogSize ?? DEFAULT_MAX_LOG_SIZE,
    options?.maxLogFiles ?? DEFAULT_MAX_LOG_FILES,
  );
  logger.addReporter(createFileReporter(path.join(logDir, LOG_FILE_NAME)));
}

/** Create a child logger with a consistent component tag for NDJSON `tag` field. */
export function createTaggedLogger(tag: string) {
  return logger.withTag(tag);
}

/** Extract structured error fields for consistent NDJSON logging. */
export function logError(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}
