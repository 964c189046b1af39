/**
 * Parameter descriptors for pages, locators and default handlers.
 *
 * Descriptors are declared next to each page at registration time and carry
 * everything the binder needs: the name matched against path segments and
 * named values, how the parameter may be filled, an optional default, and
 * the coercer applied to raw strings.
 *
 * @example
 * ```typescript
 * const params = [
 *   positional('topic', { coerce: int }),
 *   keyword('offset', { coerce: int, default: 0 }),
 *   keyword('num', { coerce: int, default: 10 }),
 * ] as const;
 *
 * // BoundArgs<typeof params> is { topic: number; offset: number; num: number }
 * ```
 */

/**
 * Function turning a raw string into a typed value.
 *
 * Signals invalid input by throwing {@link InvalidInputError}.
 */
export type Coercer<T> = (raw: string) => T;

/**
 * How a parameter may be filled.
 *
 * - positional: from leftover path segments first, then from named values
 * - keyword: from named values only
 * - rest: every path segment left after the positional parameters
 * - capture: every named value no other parameter declares
 */
export type ParamKind = 'positional' | 'keyword' | 'rest' | 'capture';

/**
 * A positional or keyword parameter holding a single value.
 */
export interface ScalarParam<N extends string = string, T = unknown> {
  readonly name: N;
  readonly kind: 'positional' | 'keyword';
  readonly coerce: Coercer<T>;
  /** Boxed default so that `undefined` is a legal default */
  readonly fallback: { readonly value: T } | null;
}

/**
 * Collects the remaining path segments; each one goes through `coerce`.
 */
export interface RestParam<N extends string = string, T = unknown> {
  readonly name: N;
  readonly kind: 'rest';
  readonly coerce: Coercer<T>;
}

/**
 * Collects the named values that no declared parameter claims.
 */
export interface CaptureParam<N extends string = string> {
  readonly name: N;
  readonly kind: 'capture';
}

/** A single declared parameter */
export type ParamDescriptor<N extends string = string, T = unknown> =
  | ScalarParam<N, T>
  | RestParam<N, T>
  | CaptureParam<N>;

/** Any descriptor, with its value type erased */
export type AnyParam = ParamDescriptor<string, unknown>;

/** Ordered parameter list of a page */
export type ParamList = readonly AnyParam[];

/** Named values gathered by a capture parameter */
export type CapturedValues = Readonly<Record<string, string>>;

/** Value type produced by a descriptor */
export type ParamValue<D> =
  D extends ScalarParam<string, infer T>
    ? T
    : D extends RestParam<string, infer T>
      ? T[]
      : D extends CaptureParam<string>
        ? CapturedValues
        : never;

/**
 * Argument object a body receives for a given parameter list.
 */
export type BoundArgs<P extends ParamList> = {
  [D in P[number] as D['name']]: ParamValue<D>;
};

/** Options for a parameter that keeps the raw string */
export interface PlainParamOptions {
  default?: string;
}

/**
 * Options for a parameter with a coercer. A `default` key that is present
 * is the default, even when its value is `undefined`.
 */
export type CoercedParamOptions<T> = { coerce: Coercer<T> } | { coerce: Coercer<T>; default: T };

const asString: Coercer<string> = (raw) => raw;

function describe<N extends string, T>(
  name: N,
  kind: 'positional' | 'keyword',
  options: PlainParamOptions | CoercedParamOptions<T> | undefined
): ScalarParam<N, T> | ScalarParam<N, string> {
  if (options && 'coerce' in options) {
    return {
      name,
      kind,
      coerce: options.coerce,
      fallback: 'default' in options ? { value: options.default } : null,
    };
  }

  const plainDefault = options?.default;
  return {
    name,
    kind,
    coerce: asString,
    fallback: plainDefault === undefined ? null : { value: plainDefault },
  };
}

/**
 * Declare a positional-or-keyword parameter.
 *
 * Filled from the path remainder in declaration order, or by name from the
 * value bag when the path runs out.
 */
export function positional<N extends string>(name: N, options?: PlainParamOptions): ScalarParam<N, string>;
export function positional<N extends string, T>(name: N, options: CoercedParamOptions<T>): ScalarParam<N, T>;
export function positional<N extends string, T>(
  name: N,
  options?: PlainParamOptions | CoercedParamOptions<T>
): ScalarParam<N, T> | ScalarParam<N, string> {
  return describe(name, 'positional', options);
}

/**
 * Declare a keyword-only parameter.
 *
 * Filled by name from the value bag only; never from path segments.
 */
export function keyword<N extends string>(name: N, options?: PlainParamOptions): ScalarParam<N, string>;
export function keyword<N extends string, T>(name: N, options: CoercedParamOptions<T>): ScalarParam<N, T>;
export function keyword<N extends string, T>(
  name: N,
  options?: PlainParamOptions | CoercedParamOptions<T>
): ScalarParam<N, T> | ScalarParam<N, string> {
  return describe(name, 'keyword', options);
}

/**
 * Declare a parameter collecting every path segment left after the
 * positional parameters. Binds to an empty array when none are left.
 *
 * @example
 * ```typescript
 * page('files', [positional('root'), rest('parts')], ({ root, parts }) => [root, ...parts].join('/'));
 * // /files/a/b/c → 'a/b/c'
 * ```
 */
export function rest<N extends string>(name: N): RestParam<N, string>;
export function rest<N extends string, T>(name: N, options: { coerce: Coercer<T> }): RestParam<N, T>;
export function rest<N extends string, T>(
  name: N,
  options?: { coerce: Coercer<T> }
): RestParam<N, T> | RestParam<N, string> {
  if (options) {
    return { name, kind: 'rest', coerce: options.coerce };
  }
  return { name, kind: 'rest', coerce: asString };
}

/**
 * Declare a parameter collecting the named values that no other parameter
 * of the same handler declares.
 *
 * @example
 * ```typescript
 * page('search', [keyword('q'), capture('filters')], ({ q, filters }) => find(q, filters));
 * // /search?q=x&lang=en → filters is { lang: 'en' }
 * ```
 */
export function capture<N extends string>(name: N): CaptureParam<N> {
  return { name, kind: 'capture' };
}

/**
 * Number of parameters that may be filled from single path segments.
 */
export function countPositional(params: ParamList): number {
  let count = 0;
  for (const param of params) {
    if (param.kind === 'positional') {
      count++;
    }
  }
  return count;
}

/**
 * Check if a parameter list can take the segment a default handler is
 * selected for.
 */
export function takesSegments(params: ParamList): boolean {
  return params.some((param) => param.kind === 'positional' || param.kind === 'rest');
}
