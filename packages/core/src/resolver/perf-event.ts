import { Telemetry, type Span } from "arbor-kernel";

export type PerfMarker =
  | "start_create_layout"
  | "end_create_layout"
  | "start_reconcile_layout"
  | "end_reconcile_layout"
  | "start_measure"
  | "end_measure";

/**
 * Timing of one pass. Markers land as attributes on a telemetry span.
 */
export interface PerfEvent {
  markerPoint(marker: PerfMarker): void;
  end(): void;
}

export function createPerfEvent(name: string, now: () => number = Date.now): PerfEvent {
  const span: Span = Telemetry.startSpan(name);
  return {
    markerPoint(marker) {
      span.setAttribute(`marker.${marker}`, now());
    },
    end() {
      span.end();
    },
  };
}
