/**
 * packages/core/src/debug/types.ts — Layout trace record types.
 *
 * Why: Layout runs once per draw and must never throw, so everything worth
 * knowing about a pass (scale factor, donations, skipped consumer indices)
 * is reported as structured records through a pluggable sink instead.
 */

/** Trace severity, ordered trace < info < warn < error. */
export type TraceSeverity = "trace" | "info" | "warn" | "error";

/** Subsystem that emitted a record. */
export type TraceCategory = "layout" | "draw" | "focus" | "input";

/** Arbitrary structured payload. Values must be JSON-serializable. */
export type TraceData = Readonly<Record<string, unknown>>;

export type TraceRecord = Readonly<{
  severity: TraceSeverity;
  category: TraceCategory;
  message: string;
  data?: TraceData;
}>;

export type TraceSink = (record: TraceRecord) => void;

export type TraceConfig = Readonly<{
  /** Records below this severity are dropped. */
  minSeverity: TraceSeverity;
  /** Categories to keep. Omitted means all. */
  categories?: readonly TraceCategory[];
}>;

/**
 * Trace handle passed down into layout passes.
 *
 * `enabled(severity)` lets hot paths skip building payloads that would be
 * filtered anyway.
 */
export interface LayoutTrace {
  enabled(severity: TraceSeverity, category?: TraceCategory): boolean;
  emit(severity: TraceSeverity, category: TraceCategory, message: string, data?: TraceData): void;
}
