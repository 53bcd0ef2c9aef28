import { severityRank } from "./constants.js";
import type {
  LayoutTrace,
  TraceCategory,
  TraceConfig,
  TraceData,
  TraceRecord,
  TraceSeverity,
  TraceSink,
} from "./types.js";

const NOOP_TRACE: LayoutTrace = Object.freeze({
  enabled: () => false,
  emit: () => {},
});

/** Trace that drops everything. Default for containers. */
export function noopTrace(): LayoutTrace {
  return NOOP_TRACE;
}

export type CreateLayoutTraceOptions = TraceConfig &
  Readonly<{
    sink: TraceSink;
  }>;

export function createLayoutTrace(opts: CreateLayoutTraceOptions): LayoutTrace {
  const minRank = severityRank(opts.minSeverity);
  const categories = opts.categories ? new Set<TraceCategory>(opts.categories) : null;
  const sink = opts.sink;

  const enabled = (severity: TraceSeverity, category?: TraceCategory): boolean => {
    if (severityRank(severity) < minRank) return false;
    if (category !== undefined && categories !== null && !categories.has(category)) return false;
    return true;
  };

  return Object.freeze({
    enabled,
    emit(severity: TraceSeverity, category: TraceCategory, message: string, data?: TraceData) {
      if (!enabled(severity, category)) return;
      const record: TraceRecord =
        data === undefined
          ? { severity, category, message }
          : { severity, category, message, data };
      sink(record);
    },
  });
}

/** Render a record as a single log line: `[cellflex][layout] warn: message {json}`. */
export function formatTraceRecord(record: TraceRecord): string {
  const head = `[cellflex][${record.category}] ${record.severity}: ${record.message}`;
  if (record.data === undefined) return head;
  return `${head} ${JSON.stringify(record.data)}`;
}

/** Sink writing formatted records to `console.error` (stdout belongs to the terminal). */
export function consoleTraceSink(record: TraceRecord): void {
  console.error(formatTraceRecord(record));
}

/**
 * Sink that keeps records in memory. Useful for tests and for dumping the last
 * layout pass on demand.
 */
export type MemoryTraceSink = Readonly<{
  sink: TraceSink;
  records: () => readonly TraceRecord[];
  clear: () => void;
}>;

export function createMemoryTraceSink(limit = 1024): MemoryTraceSink {
  const cap = Number.isInteger(limit) && limit > 0 ? limit : 1024;
  const buf: TraceRecord[] = [];
  return Object.freeze({
    sink(record: TraceRecord) {
      buf.push(record);
      if (buf.length > cap) buf.splice(0, buf.length - cap);
    },
    records: () => buf.slice(),
    clear() {
      buf.length = 0;
    },
  });
}
