/**
 * packages/core/src/debug/index.ts — Layout trace public exports.
 *
 * @example
 * ```ts
 * import { createLayoutTrace, createMemoryTraceSink } from "@cellflex/core/debug";
 *
 * const mem = createMemoryTraceSink();
 * const trace = createLayoutTrace({ minSeverity: "info", sink: mem.sink });
 * ```
 */

export type {
  LayoutTrace,
  TraceCategory,
  TraceConfig,
  TraceData,
  TraceRecord,
  TraceSeverity,
  TraceSink,
} from "./types.js";

export {
  TRACE_CATEGORIES,
  TRACE_ENV_VAR,
  TRACE_SEVERITIES,
  TRACE_SEV_ERROR,
  TRACE_SEV_INFO,
  TRACE_SEV_TRACE,
  TRACE_SEV_WARN,
  isTraceCategory,
  isTraceSeverity,
  severityRank,
} from "./constants.js";

export {
  type CreateLayoutTraceOptions,
  type MemoryTraceSink,
  consoleTraceSink,
  createLayoutTrace,
  createMemoryTraceSink,
  formatTraceRecord,
  noopTrace,
} from "./trace.js";

export { createTraceFromEnv, resolveTraceConfig } from "./config.js";
