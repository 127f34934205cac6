import type { VElement, Primitive, VChild } from "./shared.js";

/**
 * Create a text element VNode
 */
export const createTextElement = (text: string): VElement => ({
  type: "TEXT_ELEMENT",
  props: {
    nodeValue: text,
    children: [],
  },
});

/**
 * An empty fragment. Rendered when there is nothing to show.
 */
export const empty = (): VElement => ({
  type: "FRAGMENT",
  props: { children: [] },
});

/**
 * Whether an element is an empty fragment
 */
export const isEmpty = (element: VElement): boolean =>
  element.type === "FRAGMENT" && (element.props.children ?? []).length === 0;

const normalizeChildren = (children: VChild[]): VElement[] =>
  children.flatMap((child): VElement[] => {
    if (child === false || child === true || child === null || child === undefined) {
      return [];
    }
    if (Array.isArray(child)) {
      return normalizeChildren(child);
    }
    if (typeof child === "object") {
      return [child];
    }
    return [createTextElement(String(child))];
  });

/**
 * Create a virtual element
 */
export function h(
  type: Primitive,
  props: { [key: string]: unknown } = {},
  children: VChild[] = [],
): VElement {
  return {
    type,
    props: {
      ...props,
      children: normalizeChildren(children),
    },
  };
}
