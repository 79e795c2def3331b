import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';
import { isRecord, numberField, stringField } from '../utils/guards.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep per prefix */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Enable pretty printing on the console */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Timestamped log filename, e.g. `bot-2026-03-01T08-00-00-000Z.log`.
 */
function generateLogFilename(prefix: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${prefix}-${timestamp}.log`;
}

/**
 * Remove empty log files and keep only the newest `maxFiles` for a prefix.
 */
function cleanupOldLogs(logDir: string, prefix: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(`${prefix}-`) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime)
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch {
      // Another process may have removed it already
    }
  }
}

function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Pino mixin that injects the active trace context (traceId, origin, spanId).
 * Explicit fields passed to a log call win over the mixin values.
 */
function createTraceMixin(): () => Record<string, unknown> {
  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};
    return { traceId: ctx.traceId, origin: ctx.origin, spanId: ctx.spanId };
  };
}

/**
 * Create the application logger.
 *
 * - Console output (pino-pretty in development, JSON on stdout otherwise)
 * - File output with a timestamp-based filename
 * - Old and empty log files pruned on startup
 * - Trace context injected into every entry
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  ensureLogDir(logDir);
  cleanupOldLogs(logDir, 'bot', maxFiles);

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({ target: 'pino-pretty', level, options: { colorize: true } });
  } else {
    targets.push({ target: 'pino/file', level, options: { destination: 1 } });
  }

  targets.push({
    target: 'pino-pretty',
    level,
    options: {
      destination: path.join(logDir, generateLogFilename('bot')),
      mkdir: true,
      colorize: false,
    },
  });

  return pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });
}

/**
 * Create the transcript logger.
 *
 * Writes model requests, responses and tool traffic as plain text lines
 * (`[HH:mm:ss.mmm] [traceId] message`) to its own file, so a whole turn can be
 * read top to bottom without JSON noise.
 */
export function createTranscriptLogger(
  logDir = './data/logs',
  level: pino.Level = 'info',
  maxFiles = 10
): pino.Logger {
  ensureLogDir(logDir);
  cleanupOldLogs(logDir, 'transcript', maxFiles);

  const logStream = fs.createWriteStream(path.join(logDir, generateLogFilename('transcript')), {
    flags: 'a',
  });

  const destination = {
    write(chunk: string): void {
      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        logStream.write(chunk);
        return;
      }
      if (!isRecord(parsed)) return;

      const msg = stringField(parsed, 'msg');
      if (msg === undefined) return;

      const time = numberField(parsed, 'time');
      const traceId = stringField(parsed, 'traceId');
      let prefix = time !== undefined ? `[${new Date(time).toISOString().slice(11, 23)}] ` : '';
      if (traceId) {
        prefix += `[${traceId.slice(0, 8)}] `;
      }
      logStream.write(prefix + msg + '\n');
    },
  };

  return pino({ level, mixin: createTraceMixin() }, destination);
}
