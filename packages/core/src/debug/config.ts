import { TRACE_ENV_VAR, isTraceCategory, isTraceSeverity } from "./constants.js";
import { consoleTraceSink, createLayoutTrace, noopTrace } from "./trace.js";
import type { LayoutTrace, TraceCategory, TraceConfig } from "./types.js";

type EnvLike = Readonly<Record<string, string | undefined>>;

/**
 * Parse trace configuration from an environment record.
 *
 * Format: `CELLFLEX_TRACE=<severity>[:<category>,<category>...]`, e.g.
 * `CELLFLEX_TRACE=info` or `CELLFLEX_TRACE=trace:layout,focus`.
 * Unset, empty, `off`, `0` or an unknown severity yields `null` (tracing off).
 * Unknown categories are ignored; if none remain, all categories are kept.
 */
export function resolveTraceConfig(env: EnvLike): TraceConfig | null {
  const raw = env[TRACE_ENV_VAR];
  if (raw === undefined) return null;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "" || normalized === "off" || normalized === "0") return null;

  const sep = normalized.indexOf(":");
  const severityPart = sep < 0 ? normalized : normalized.slice(0, sep);
  if (!isTraceSeverity(severityPart)) return null;
  if (sep < 0) return { minSeverity: severityPart };

  const categories: TraceCategory[] = [];
  for (const part of normalized.slice(sep + 1).split(",")) {
    const name = part.trim();
    if (isTraceCategory(name) && !categories.includes(name)) categories.push(name);
  }
  if (categories.length === 0) return { minSeverity: severityPart };
  return { minSeverity: severityPart, categories };
}

/** Build the trace selected by the environment, writing to `console.error`. */
export function createTraceFromEnv(env: EnvLike): LayoutTrace {
  const config = resolveTraceConfig(env);
  if (config === null) return noopTrace();
  return createLayoutTrace({ ...config, sink: consoleTraceSink });
}
