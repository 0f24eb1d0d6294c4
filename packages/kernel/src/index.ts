/**
 * # Arbor Kernel
 *
 * Low-level primitives shared by the resolution engine.
 *
 * ## Core Primitives
 *
 * - **Context** - Execution-scoped state with automatic propagation (AsyncLocalStorage)
 * - **Threads** - Foreground/background thread identity on top of Context
 * - **Logger** - Structured logging (pino) with context injection
 * - **Telemetry** - Spans and counters behind a pluggable provider
 * - **LifecycleLog** - Bounded lifecycle event history for postmortems
 * - **ResolutionFuture** - Interrupt/release flags of a scheduled pass
 *
 * @module arbor-kernel
 */

export * from "./context";
export * from "./logger";
export * from "./telemetry";
export * from "./lifecycle-log";
export * from "./future";
