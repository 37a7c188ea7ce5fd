import pino from "pino";
import path from "path";
import { fileURLToPath } from "url";
import fs from "fs";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const LOG_FILE_PREFIX = "quote-monitor-";
const LOG_FILE_PATTERN = /^quote-monitor-(\d{4}-\d{2}-\d{2})\.log$/;

// Vitest sets VITEST=true; tests get a silent logger and no file or worker transport
const isTest = process.env.VITEST === "true";

export function logDirectory(): string {
  return process.env.LOG_DIR ?? path.join(__dirname, "../data/logs");
}

/** One JSON log file per UTC day: quote-monitor-YYYY-MM-DD.log */
export function logFilePath(date: Date = new Date(), dir: string = logDirectory()): string {
  return path.join(dir, `${LOG_FILE_PREFIX}${date.toISOString().slice(0, 10)}.log`);
}

/** The YYYY-MM-DD a log file was written on, or null for any other file. */
export function parseLogFileDate(fileName: string): string | null {
  const match = LOG_FILE_PATTERN.exec(fileName);
  return match ? match[1] : null;
}

function createLogger(): pino.Logger {
  if (isTest) {
    return pino({ level: "silent" });
  }

  const dir = logDirectory();
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

  // stderr for people, the daily file for tooling; stdout belongs to the quote table
  const transport = pino.transport({
    targets: [
      {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname,service",
        },
        level: process.env.LOG_LEVEL ?? "info",
      },
      {
        target: "pino/file",
        options: { destination: logFilePath(new Date(), dir), mkdir: true },
        level: "debug",
      },
    ],
  });

  return pino({ level: "debug", base: { service: "quote-monitor" } }, transport);
}

export const logger = createLogger();

export const logIngest = logger.child({ subsystem: "ingest" });
export const logRender = logger.child({ subsystem: "render-scheduler" });
export const logFeed = logger.child({ subsystem: "feed" });
export const logMonitor = logger.child({ subsystem: "monitor" });

/**
 * Deletes daily log files dated more than `keepDays` days before `now`.
 * Returns the number of files removed; other files in the directory are left alone.
 */
export function pruneOldLogs(keepDays: number = 30, now: Date = new Date()): number {
  const dir = logDirectory();
  const cutoff = new Date(now.getTime() - keepDays * 86_400_000).toISOString().slice(0, 10);

  let removed = 0;
  try {
    if (!fs.existsSync(dir)) return 0;
    for (const file of fs.readdirSync(dir)) {
      const day = parseLogFileDate(file);
      if (day === null || day >= cutoff) continue;
      fs.unlinkSync(path.join(dir, file));
      removed++;
      logger.info({ file }, "Pruned old log file");
    }
  } catch (err) {
    logger.warn({ err, dir }, "Failed to prune old logs");
  }
  return removed;
}
