import path from "path";

const LOG_FILE_RE = /^screener-(\d{4}-\d{2}-\d{2})\.log$/;

/** Daily log file name for the UTC day of `at`. */
export function logFileName(at: Date): string {
  return `screener-${at.toISOString().slice(0, 10)}.log`;
}

/**
 * Names of daily log files dated strictly before `now - keepDays`.
 * Files that do not follow the daily naming are never selected.
 */
export function staleLogFiles(files: readonly string[], keepDays: number, now: Date): string[] {
  const cutoff = new Date(now.getTime());
  cutoff.setUTCDate(cutoff.getUTCDate() - keepDays);
  const cutoffDay = cutoff.toISOString().slice(0, 10);

  return files.filter((file) => {
    const match = LOG_FILE_RE.exec(file);
    return match !== null && match[1] < cutoffDay;
  });
}

/** `LOG_DIR` when set, otherwise `data/logs` under the working directory. */
export function resolveLogsDir(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  return path.resolve(cwd, env.LOG_DIR || "data/logs");
}
