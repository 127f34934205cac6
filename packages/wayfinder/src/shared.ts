import type * as Effect from "effect/Effect";
import type * as Stream from "effect/Stream";

/**
 * Primitive element types: HTML tags, text nodes and fragments
 */
export type Primitive = keyof HTMLElementTagNameMap | "TEXT_ELEMENT" | "FRAGMENT";

/**
 * What can appear as children of an element (recursive type)
 */
export type VChild =
  | VElement
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | VChild[];

/**
 * What components can return - VElement or wrapped in Effect/Stream
 */
export type VNode =
  | VElement
  | Effect.Effect<VElement, unknown, unknown>
  | Stream.Stream<VElement, unknown, unknown>;

/**
 * Element type can be a primitive or a component function
 */
export type ElementType<Props = {}> = Primitive | ((props: Props) => VNode);

/**
 * Virtual element - the unit a route renders to
 */
export interface VElement {
  type: ElementType;
  props: {
    [key: string]: unknown;
    children?: VElement[];
  };
}
