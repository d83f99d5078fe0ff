import pino from "pino";
import path from "path";
import fs from "fs";
import { logFileName, resolveLogsDir, staleLogFiles } from "./log-retention.js";

export const logsDir = resolveLogsDir();
fs.mkdirSync(logsDir, { recursive: true });

// stderr for people, JSON file for later grepping
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
      options: { destination: path.join(logsDir, logFileName(new Date())), mkdir: true },
      level: "debug",
    },
  ],
});

export const logger = pino({ level: "debug", base: { service: "exp-screener" } }, transport);

export const logProvider = logger.child({ subsystem: "providers" });
export const logScan = logger.child({ subsystem: "screener" });
export const logCache = logger.child({ subsystem: "cache" });
export const logAnalysis = logger.child({ subsystem: "analysis" });

/** Delete daily log files older than `keepDays`. Returns how many were removed. */
export function pruneOldLogs(keepDays = 30, now = new Date()): number {
  let removed = 0;
  try {
    for (const file of staleLogFiles(fs.readdirSync(logsDir), keepDays, now)) {
      fs.unlinkSync(path.join(logsDir, file));
      removed++;
      logger.debug({ file }, "Pruned old log file");
    }
  } catch (err) {
    logger.warn({ err }, "Failed to prune old logs");
  }
  return removed;
}
