/**
 * # Arbor Shared
 *
 * Platform-independent definitions shared across all Arbor packages.
 *
 * ## Errors
 *
 * - **LifecycleError** - access after release, double release, committed node mutation (fatal)
 * - **KeyCollisionError** - two components with the same global key (fatal)
 * - **ResolutionError** - a single component failed; its subtree resolves to `null`
 * - **ValidationError** - invalid configuration or input values
 *
 * @module arbor-shared
 */

export * from "./errors";
