/**
 * Stage tracing
 *
 * With `debug` on, every constructed stage is reported as one line:
 *
 * ```
 * [rangeline] filter 80 -> 40 (owned)
 * [rangeline] take 40 -> 10 (borrowed)
 * ```
 */

import { config } from "./config.js";

/** Receives one rendered trace line at a time. */
export type TraceWriter = (line: string) => void;

/** Whether a stage's range points into its own storage or its input's. */
export type StorageMode = "borrowed" | "owned";

/**
 * A stage construction, as reported to the trace writer.
 */
export interface StageEvent {
  operation: string;
  inputLength: number;
  outputLength: number;
  storage: StorageMode;
}

const defaultWriter: TraceWriter = (line) => console.error(line);

let writer: TraceWriter = defaultWriter;

/**
 * Replace the trace writer (default: console.error). Returns the previous
 * one so callers can restore it.
 */
export function setTraceWriter(next: TraceWriter | undefined): TraceWriter {
  const previous = writer;
  writer = next ?? defaultWriter;
  return previous;
}

/** Render a stage event the way the trace writer receives it. */
export function renderStageEvent(event: StageEvent): string {
  return `[rangeline] ${event.operation} ${event.inputLength} -> ${event.outputLength} (${event.storage})`;
}

/** Report a stage construction if `debug` is on. */
export function traceStage(event: StageEvent): void {
  if (!config.get("debug")) return;
  writer(renderStageEvent(event));
}
