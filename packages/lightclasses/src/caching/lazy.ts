/**
 * Compute-once values
 *
 * The first read runs `compute` and publishes its result; every later read
 * returns the published value. A computation that throws publishes nothing,
 * so the next read tries again.
 */

const NOT_COMPUTED: unique symbol = Symbol("notComputed");

export type Lazy<T> = {
  readonly value: T;
  readonly isComputed: boolean;
};

export const lazy = <T>(compute: () => T): Lazy<T> => {
  let slot: T | typeof NOT_COMPUTED = NOT_COMPUTED;
  return {
    get value(): T {
      if (slot === NOT_COMPUTED) {
        slot = compute();
      }
      return slot;
    },
    get isComputed(): boolean {
      return slot !== NOT_COMPUTED;
    },
  };
};
