export type LayoutDirection = "inherit" | "ltr" | "rtl";

export type FlexDirection = "column" | "row";

/**
 * Common layout props a component may carry; copied onto the node it
 * resolves to.
 */
export interface Style {
  width?: number;
  height?: number;
  padding?: number;
  flexDirection?: FlexDirection;
  layoutDirection?: LayoutDirection;
}

export function isStyleEqual(a: Style | null, b: Style | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return (
    a.width === b.width &&
    a.height === b.height &&
    a.padding === b.padding &&
    a.flexDirection === b.flexDirection &&
    a.layoutDirection === b.layoutDirection
  );
}
