export type { VElement, VChild, VNode, Primitive, ElementType } from "./shared.js";
export { h, empty, isEmpty, createTextElement } from "./h.js";

export * from "./router/index.js";
