/**
 * Core module exports for @rangeline/core
 *
 * This package provides:
 * - Container kinds as type-level functions (Apply, ArrayF, SetF)
 * - Ordering for ordered containers (Ord, naturalOrder)
 * - Error classes, configuration and stage tracing
 */

// Container kinds
export type { TypeFunction, Apply, ArrayF, SetF } from "./hkt.js";

// Ordering
export {
  LT,
  EQ_ORD,
  GT,
  ordNumber,
  ordBigInt,
  ordString,
  ordBoolean,
  ordDate,
  reverse,
  naturalOrder,
  type Ordering,
  type Comparator,
  type Ord,
} from "./order.js";

// Errors
export {
  PipelineError,
  PreconditionError,
  EmptyReduceError,
  InvalidCountError,
  InvalidStepError,
  type PipelineErrorCode,
} from "./errors.js";

// Configuration System
export { config, type RangelineConfig, type PreconditionMode } from "./config.js";

// Stage tracing
export {
  setTraceWriter,
  renderStageEvent,
  traceStage,
  type TraceWriter,
  type StorageMode,
  type StageEvent,
} from "./trace.js";
