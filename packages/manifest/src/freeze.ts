/**
 * Immutability helpers for decoded manifests.
 */

export type DeepReadonly<T> = T extends (infer E)[]
  ? readonly DeepReadonly<E>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Freezes `value` and everything reachable from it, in place.
 * Already-frozen branches are skipped, which also stops cycles.
 */
export function deepFreeze<T>(value: T): DeepReadonly<T>;
export function deepFreeze(value: unknown): unknown {
  const pending: unknown[] = [value];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === null || typeof current !== "object" || Object.isFrozen(current)) {
      continue;
    }
    Object.freeze(current);
    pending.push(...Object.values(current));
  }

  return value;
}
