/**
 * Size specs
 *
 * A size spec constrains one dimension of a node: the mode says how binding
 * the size is.
 *
 * - `EXACT` - the node must be exactly `size`
 * - `AT_MOST` - the node may be any size up to `size`
 * - `UNSPECIFIED` - no constraint; `size` is ignored
 */

import { ValidationError } from "arbor-shared";

export const SizeSpecMode = {
  Exact: "EXACT",
  AtMost: "AT_MOST",
  Unspecified: "UNSPECIFIED",
} as const;

export type SizeSpecMode = (typeof SizeSpecMode)[keyof typeof SizeSpecMode];

export interface SizeSpec {
  readonly mode: SizeSpecMode;
  readonly size: number;
}

const UNSPECIFIED_SPEC: SizeSpec = Object.freeze({ mode: SizeSpecMode.Unspecified, size: 0 });

export function makeSizeSpec(size: number, mode: SizeSpecMode): SizeSpec {
  if (mode === SizeSpecMode.Unspecified) {
    return UNSPECIFIED_SPEC;
  }
  if (!Number.isFinite(size) || size < 0) {
    throw new ValidationError("size", `Size spec size must be a finite number >= 0, received ${size}`);
  }
  return Object.freeze({ mode, size });
}

export const SizeSpec = {
  exact(size: number): SizeSpec {
    return makeSizeSpec(size, SizeSpecMode.Exact);
  },

  atMost(size: number): SizeSpec {
    return makeSizeSpec(size, SizeSpecMode.AtMost);
  },

  /** The placeholder used while real constraints are unknown. */
  unspecified(): SizeSpec {
    return UNSPECIFIED_SPEC;
  },

  equals(a: SizeSpec, b: SizeSpec): boolean {
    return a.mode === b.mode && (a.mode === SizeSpecMode.Unspecified || a.size === b.size);
  },

  toString(spec: SizeSpec): string {
    return spec.mode === SizeSpecMode.Unspecified ? "UNSPECIFIED" : `${spec.mode} ${spec.size}`;
  },
};

/**
 * Final size for a dimension given the node's preferred size.
 */
export function resolveSize(spec: SizeSpec, desired: number): number {
  switch (spec.mode) {
    case SizeSpecMode.Exact:
      return spec.size;
    case SizeSpecMode.AtMost:
      return Math.min(desired, spec.size);
    case SizeSpecMode.Unspecified:
      return desired;
  }
}

/**
 * Shrink a spec by `amount` (padding, borders); never below zero.
 */
export function shrinkSizeSpec(spec: SizeSpec, amount: number): SizeSpec {
  if (spec.mode === SizeSpecMode.Unspecified || amount === 0) {
    return spec;
  }
  return makeSizeSpec(Math.max(0, spec.size - amount), spec.mode);
}

// ============================================================================
// Compatibility
// ============================================================================

/**
 * Whether a result measured against `oldSpec` (producing `oldMeasuredSize`)
 * is still valid for a request of `newSpec`.
 *
 * - EXACT only matches an EXACT request of the identical size.
 * - AT_MOST matches a tighter-or-equal AT_MOST bound the old measurement
 *   still fits in, or an EXACT request equal to the measured size.
 * - UNSPECIFIED never matches; the node is measured again.
 */
export function isSizeSpecCompatible(
  oldSpec: SizeSpec,
  newSpec: SizeSpec,
  oldMeasuredSize: number,
): boolean {
  switch (oldSpec.mode) {
    case SizeSpecMode.Unspecified:
      return false;
    case SizeSpecMode.Exact:
      return newSpec.mode === SizeSpecMode.Exact && newSpec.size === oldSpec.size;
    case SizeSpecMode.AtMost:
      if (newSpec.mode === SizeSpecMode.Exact) {
        return newSpec.size === oldMeasuredSize;
      }
      return (
        newSpec.mode === SizeSpecMode.AtMost &&
        newSpec.size <= oldSpec.size &&
        oldMeasuredSize <= newSpec.size
      );
  }
}

/**
 * Two-dimensional compatibility check; both axes must be compatible.
 */
export function hasCompatibleSizeSpec(
  oldWidthSpec: SizeSpec,
  oldHeightSpec: SizeSpec,
  newWidthSpec: SizeSpec,
  newHeightSpec: SizeSpec,
  oldMeasuredWidth: number,
  oldMeasuredHeight: number,
): boolean {
  return (
    isSizeSpecCompatible(oldWidthSpec, newWidthSpec, oldMeasuredWidth) &&
    isSizeSpecCompatible(oldHeightSpec, newHeightSpec, oldMeasuredHeight)
  );
}
