/**
 * Named values available for binding.
 *
 * The transport merges query string and form body parameters into a single
 * bag. When the same key occurs more than once, the last occurrence wins:
 * a form field therefore overrides a query parameter of the same name when
 * the form pairs are appended after the query pairs.
 */

/** Read-only name → raw value mapping */
export type ValueBag = ReadonlyMap<string, string>;

/**
 * Anything a value bag can be built from.
 */
export type ValueSource =
  | ValueBag
  | URLSearchParams
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string>>;

/** Shared empty bag */
export const EMPTY_VALUES: ValueBag = new Map();

function isIterable(
  source: ValueSource
): source is Iterable<readonly [string, string]> | URLSearchParams {
  return Symbol.iterator in source;
}

/**
 * Normalize a value source into a {@link ValueBag}.
 *
 * Pairs are applied in iteration order, so a repeated key keeps its last
 * value. The result is always a fresh map, even for a Map source.
 *
 * @example
 * toValueBag([['id', '1'], ['id', '2']]).get('id'); // '2'
 * toValueBag(new URLSearchParams('a=1&a=3')).get('a'); // '3'
 * toValueBag({ name: 'John' }).get('name'); // 'John'
 */
export function toValueBag(source?: ValueSource | null): ValueBag {
  if (!source) {
    return EMPTY_VALUES;
  }

  if (source instanceof Map) {
    return new Map(source);
  }

  const bag = new Map<string, string>();
  if (isIterable(source)) {
    for (const [key, value] of source) {
      bag.set(key, value);
    }
    return bag;
  }

  for (const [key, value] of Object.entries(source)) {
    bag.set(key, value);
  }
  return bag;
}

/**
 * Merge several sources into one bag; later sources override earlier ones.
 */
export function mergeValues(...sources: Array<ValueSource | null | undefined>): ValueBag {
  const bag = new Map<string, string>();
  for (const source of sources) {
    for (const [key, value] of toValueBag(source)) {
      bag.set(key, value);
    }
  }
  return bag;
}
