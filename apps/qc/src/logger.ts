import pino, { type BaseLogger, type Logger } from "pino";
import type { QcNoticeV1 } from "@waveqc/contracts";

export type QcLogger = BaseLogger;

const LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export function normalizeLevel(value: string | undefined): string {
  const normalized = String(value ?? "info").toLowerCase();
  if (normalized === "warning") return "warn";
  return LEVELS.has(normalized) ? normalized : "info";
}

export function createLogger(level?: string): Logger {
  return pino({ name: "waveqc", level: normalizeLevel(level ?? process.env.WAVEQC_LOG_LEVEL) });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function logNotice(log: QcLogger, notice: QcNoticeV1): void {
  const fields = { parameter: notice.parameter, test: notice.test, code: notice.code };
  if (notice.code === "DEFAULT_USED") {
    log.info(fields, notice.message);
  } else {
    log.warn(fields, notice.message);
  }
}
