import { isStyleEqual } from "../tree/style";
import type { StateValues } from "../state/tree-state";
import { isComponent, type Component } from "./component";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Structural equality for prop values. Components compare by equivalence,
 * arrays and plain objects element-wise, everything else by identity.
 */
export function isEquivalentValue(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;

  if (isComponent(a) && isComponent(b)) {
    return isEquivalentComponent(a, b);
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((value, i) => isEquivalentValue(value, b[i]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && isEquivalentValue(a[key], b[key]));
  }

  return false;
}

/**
 * Same type, key and style, and equivalent props (by the definition's
 * `isEquivalent` when it has one).
 */
export function isEquivalentComponent(a: Component, b: Component): boolean {
  if (a === b) return true;
  if (a.type !== b.type || a.key !== b.key || !isStyleEqual(a.style, b.style)) {
    return false;
  }
  const definition = a.type.definition;
  return definition.isEquivalent
    ? definition.isEquivalent(a.props, b.props)
    : isEquivalentValue(a.props, b.props);
}

export function isShallowEqualState(a: StateValues, b: StateValues): boolean {
  if (a === b) return true;
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => Object.is(a[key], b[key]));
}
