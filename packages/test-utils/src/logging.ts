import { createLogger, type Logger } from "@dtrack/shared";

const LEVEL_NAMES: Record<number, string> = {
  10: "trace",
  20: "debug",
  30: "info",
  40: "warn",
  50: "error",
  60: "fatal",
};

export interface CapturedLogLine {
  level: string;
  msg: string;
  fields: Record<string, unknown>;
}

/**
 * Logger that keeps every line it writes, parsed, at debug level and up.
 */
export function captureLogs(): { logger: Logger; lines: CapturedLogLine[] } {
  const lines: CapturedLogLine[] = [];
  const destination = {
    write: (line: string) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed !== "object" || parsed === null) {
        return;
      }
      const fields: Record<string, unknown> = { ...parsed };
      const level = fields["level"];
      const msg = fields["msg"];
      lines.push({
        level: typeof level === "number" ? (LEVEL_NAMES[level] ?? String(level)) : "unknown",
        msg: typeof msg === "string" ? msg : "",
        fields,
      });
    },
  };
  const logger = createLogger({ name: "test", level: "debug", destination });
  return { logger, lines };
}

export function assertLogContains(
  lines: CapturedLogLine[],
  matcher: { level?: string; message?: string },
): void {
  const hit = lines.some((line) => {
    if (matcher.level && line.level !== matcher.level) {
      return false;
    }
    if (matcher.message && !line.msg.includes(matcher.message)) {
      return false;
    }
    return true;
  });

  if (!hit) {
    throw new Error(
      `Expected logs to contain entry with level=${matcher.level ?? "*"} and message~=${
        matcher.message ?? "*"
      }`,
    );
  }
}
