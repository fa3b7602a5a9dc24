/**
 * Core module exports for @optio/core
 *
 * This package provides:
 * - The unified configuration store (defaults, rc files, OPTIO_* env vars)
 * - Leveled console diagnostics
 */

// Configuration System
export { config, defineConfig, type OptioConfig, type OptionConfig } from "./config.js";

// Diagnostics System
export {
  report,
  formatReport,
  isReportLevel,
  setWriter,
  resetWriter,
  REPORT_LEVELS,
  type ReportLevel,
  type DiagnosticWriter,
} from "./diagnostics.js";
