/**
 * Leveled Diagnostics
 *
 * Console-backed reporting shared by optio packages. Every line has the form
 *
 * ```
 * [optio/<scope>] WARN: <message>
 * ```
 *
 * and goes to `console.error`, `console.warn` or `console.info` depending on
 * its level. The writer can be swapped out for embedding or tests.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Severity of a report. `"off"` suppresses the report entirely.
 */
export type ReportLevel = "error" | "warn" | "info" | "off";

/**
 * Receives every rendered line that is not suppressed.
 */
export type DiagnosticWriter = (level: Exclude<ReportLevel, "off">, line: string) => void;

export const REPORT_LEVELS: readonly ReportLevel[] = ["error", "warn", "info", "off"];

// ============================================================================
// Writer
// ============================================================================

const consoleWriter: DiagnosticWriter = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
  }
};

let writer: DiagnosticWriter = consoleWriter;

/**
 * Route reports to `next` instead of the console.
 */
export function setWriter(next: DiagnosticWriter): void {
  writer = next;
}

/**
 * Restore the console writer.
 */
export function resetWriter(): void {
  writer = consoleWriter;
}

// ============================================================================
// Reporting
// ============================================================================

export function isReportLevel(value: unknown): value is ReportLevel {
  return typeof value === "string" && (REPORT_LEVELS as readonly string[]).includes(value);
}

/**
 * Render a report line without writing it.
 */
export function formatReport(level: Exclude<ReportLevel, "off">, scope: string, message: string): string {
  return `[optio/${scope}] ${level.toUpperCase()}: ${message}`;
}

/**
 * Emit a report at the given level. `"off"` is a no-op.
 */
export function report(level: ReportLevel, scope: string, message: string): void {
  if (level === "off") return;
  writer(level, formatReport(level, scope, message));
}
