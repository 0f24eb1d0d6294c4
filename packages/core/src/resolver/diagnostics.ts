import {
  ensureError,
  isFatalError,
  ResolutionError,
} from "arbor-shared";
import { Logger, type KernelLogger } from "arbor-kernel";
import type { Component } from "../component/component";
import type { ParentScope } from "../component/scope";

const log = Logger.for("Resolver");

/**
 * Receives non-fatal failures raised while resolving a component. The
 * failing subtree is dropped; the pass goes on.
 */
export interface DiagnosticsSink {
  report(error: ResolutionError): void;
}

/** Failed comparisons only cost a reuse, so they are logged at warn. */
export class LoggingDiagnosticsSink implements DiagnosticsSink {
  constructor(private readonly logger: KernelLogger = log) {}

  report(error: ResolutionError): void {
    const fields = { err: error.cause ?? error, component: error.component, hierarchy: error.hierarchy };
    if (error.code === "RESOLUTION_COMPARISON_FAILED") {
      this.logger.warn(fields, error.message);
    } else {
      this.logger.error(fields, error.message);
    }
  }
}

/**
 * Route a failure raised while resolving `component` under `parent`.
 * Fatal errors propagate; everything else is reported with the component
 * hierarchy.
 */
export function handleWithHierarchy(
  sink: DiagnosticsSink,
  parent: ParentScope,
  component: Component,
  error: unknown,
  code: "RESOLUTION_FAILED" | "RESOLUTION_COMPARISON_FAILED" = "RESOLUTION_FAILED",
): void {
  if (isFatalError(error)) {
    throw error;
  }
  const name = component.type.displayName;
  sink.report(new ResolutionError(name, [...parent.hierarchy(), name], ensureError(error), code));
}
