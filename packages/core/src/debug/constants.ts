import type { TraceCategory, TraceSeverity } from "./types.js";

/* --- Severity ranks --- */

export const TRACE_SEV_TRACE = 0;
export const TRACE_SEV_INFO = 1;
export const TRACE_SEV_WARN = 2;
export const TRACE_SEV_ERROR = 3;

const SEVERITY_RANK: Readonly<Record<TraceSeverity, number>> = Object.freeze({
  trace: TRACE_SEV_TRACE,
  info: TRACE_SEV_INFO,
  warn: TRACE_SEV_WARN,
  error: TRACE_SEV_ERROR,
});

export const TRACE_SEVERITIES: readonly TraceSeverity[] = Object.freeze([
  "trace",
  "info",
  "warn",
  "error",
]);

export const TRACE_CATEGORIES: readonly TraceCategory[] = Object.freeze([
  "layout",
  "draw",
  "focus",
  "input",
]);

/** Environment variable read by `resolveTraceConfig`. */
export const TRACE_ENV_VAR = "CELLFLEX_TRACE";

export function severityRank(severity: TraceSeverity): number {
  return SEVERITY_RANK[severity];
}

export function isTraceSeverity(value: unknown): value is TraceSeverity {
  return value === "trace" || value === "info" || value === "warn" || value === "error";
}

export function isTraceCategory(value: unknown): value is TraceCategory {
  return value === "layout" || value === "draw" || value === "focus" || value === "input";
}
