// Core store shared types

/** Opaque non-zero entity identity. */
export type Entity = number;

export const NULL_ENTITY: Entity = 0;

export type ComponentKey = string;

export interface ComponentType<TComponent> {
  readonly key: ComponentKey;
  /** Type marker only; never set at runtime. */
  readonly __component?: TComponent;
  /** Components that must already be present before this one is attached. */
  readonly requires: readonly AnyComponentType[];
}

export type AnyComponentType = ComponentType<unknown>;

export type ComponentValue<T> = T extends ComponentType<infer C> ? C : never;

export type ComponentTuple<With extends readonly AnyComponentType[]> = {
  [I in keyof With]: ComponentValue<With[I]>;
};

export interface ComponentOptions {
  requires?: readonly AnyComponentType[];
}

export function defineComponent<TComponent>(
  key: ComponentKey,
  options: ComponentOptions = {},
): ComponentType<TComponent> {
  return { key, requires: options.requires ?? [] };
}
