/**
 * @cellflex/core
 *
 * Visibility-aware single-axis flex layout for terminal cell grids.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { FlexUiError, type FlexUiErrorCode, isFlexUiError } from "./errors.js";

// =============================================================================
// Layout
// =============================================================================

export type { Axis, FlexEntry, LayoutProbe, Placement, Rect } from "./layout/types.js";
export { type FlexLayout, type FlexLayoutOptions, layoutFlex, sanitizeConsumers } from "./layout/layout.js";
export { consumptionScale, gcd, lcm } from "./layout/engine/scale.js";
export { splitEven } from "./layout/engine/splitEven.js";
export {
  type RedistributionInput,
  type RedistributionResult,
  redistribute,
} from "./layout/engine/redistribute.js";
export { type AllocationInput, type AllocationResult, allocate } from "./layout/engine/allocate.js";
export {
  type InvalidPropsFatal,
  type LayoutResult,
  type ValidatedItemSize,
  validateConsumers,
  validateItemSize,
} from "./layout/validateProps.js";
export { contains } from "./layout/hitTest.js";
export { FlexRegistry } from "./registry/flexRegistry.js";

// =============================================================================
// Widgets
// =============================================================================

export {
  type FlexChild,
  MOUSE_IGNORED,
  type MouseResult,
  type SetFocus,
} from "./widgets/types.js";
export { Box, type BoxOptions } from "./widgets/box.js";
export { VisibleFlex, type VisibleFlexOptions } from "./widgets/visibleFlex.js";
export {
  type VisibilityPredicate,
  type VisibilityTarget,
  allOf,
  alwaysVisible,
  anyOf,
  minSize,
  neverVisible,
  not,
  visibleWhen,
} from "./widgets/visibility.js";
export { type CellStyle, DEFAULT_STYLE, type Rgb24, rgb, styleEquals } from "./widgets/style.js";

// =============================================================================
// Surface and events
// =============================================================================

export { type Surface, fillRect } from "./surface/types.js";
export {
  type KeyAction,
  type KeyEvent,
  MOD_ALT,
  MOD_CTRL,
  MOD_SHIFT,
  type MouseAction,
  type MouseEvent,
} from "./events.js";

// =============================================================================
// Trace
// =============================================================================

export type { LayoutTrace, TraceRecord, TraceSeverity } from "./debug/types.js";
export { createLayoutTrace, noopTrace } from "./debug/trace.js";
export { createTraceFromEnv } from "./debug/config.js";
