/**
 * Provenance-tagged field values.
 *
 * Every resolved field records where its value came from, so the resolver
 * can express each field's fallback chain as a list of candidates instead
 * of nested conditionals.
 */

export type FieldSource<T> =
  | { readonly origin: "override"; readonly value: T }
  | { readonly origin: "inherited"; readonly from: string; readonly value: T }
  | { readonly origin: "default"; readonly value: T };

export type FieldOrigin = FieldSource<unknown>["origin"];

/** Value set in `[package.metadata.arch]`, if any */
export function overridden<T>(value: T | undefined): FieldSource<T> | undefined {
  return value === undefined ? undefined : { origin: "override", value };
}

/** Value taken from the `[package]` key `from` */
export function inherited<T>(from: string, value: T & {}): FieldSource<T>;
export function inherited<T>(from: string, value: T | undefined): FieldSource<T> | undefined;
export function inherited<T>(from: string, value: T | undefined): FieldSource<T> | undefined {
  return value === undefined ? undefined : { origin: "inherited", from, value };
}

export function byDefault<T>(value: T): FieldSource<T> {
  return { origin: "default", value };
}

/**
 * First defined candidate, else `last`.
 */
export function firstPresent<T>(
  candidates: readonly (FieldSource<T> | undefined)[],
  last: FieldSource<T>,
): FieldSource<T> {
  return candidates.find((c): c is FieldSource<T> => c !== undefined) ?? last;
}

/**
 * Human-readable origin, e.g. `override`, `default`, `package.homepage`.
 */
export function describeSource(source: FieldSource<unknown>): string {
  return source.origin === "inherited" ? `package.${source.from}` : source.origin;
}
