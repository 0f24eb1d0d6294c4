/**
 * Built-in components: stacks, text and images.
 */

import { defineComponent, type Component } from "../component/component";
import { resolveSize } from "../layout/size-spec";

export interface StackProps {
  children?: readonly Component[];
}

export const Column = defineComponent<StackProps>({
  kind: "container",
  name: "Column",
  resolve(scope, api) {
    const node = api.createNode("column");
    api.appendChildren(node, scope.props.children ?? []);
    return node;
  },
});

export const Row = defineComponent<StackProps>({
  kind: "container",
  name: "Row",
  resolve(scope, api) {
    const node = api.createNode("row");
    api.appendChildren(node, scope.props.children ?? []);
    return node;
  },
});

/** Width of one character and height of one line of text, in layout units. */
export const CHAR_WIDTH = 8;
export const LINE_HEIGHT = 16;

export interface TextProps {
  text: string;
}

export interface TextMeasurement {
  lines: number;
}

/**
 * Single-font text. Wraps when the width is bounded below its natural width.
 */
export const Text = defineComponent<TextProps>({
  kind: "leaf",
  name: "Text",
  measure(scope, widthSpec, heightSpec) {
    const natural = scope.props.text.length * CHAR_WIDTH;
    const width = resolveSize(widthSpec, natural);
    const lines = width > 0 ? Math.max(1, Math.ceil(natural / width)) : 1;
    const data: TextMeasurement = { lines };
    return {
      width,
      height: resolveSize(heightSpec, lines * LINE_HEIGHT),
      data,
    };
  },
});

export interface ImageProps {
  source: string;
  width: number;
  height: number;
}

export const Image = defineComponent<ImageProps>({
  kind: "leaf",
  name: "Image",
  measure(scope, widthSpec, heightSpec) {
    return {
      width: resolveSize(widthSpec, scope.props.width),
      height: resolveSize(heightSpec, scope.props.height),
    };
  },
});
