/**
 * Parameter binder.
 *
 * Matches a parameter list against leftover path segments and the named
 * value bag. Binding never throws for bad user input: every failure comes
 * back as `{ ok: false }` with a reason, and the resolver reports it as
 * NotFound. Only errors that are not {@link InvalidInputError} escape from a
 * coercer.
 *
 * Rules:
 * 1. Positional parameters take path segments in declaration order, then
 *    fall back to a named value with the same name.
 * 2. Keyword parameters take named values only.
 * 3. A missing value uses the declared default, otherwise binding fails.
 * 4. A path segment and a named value for the same positional parameter is
 *    a conflict and binding fails.
 * 5. A rest parameter takes every path segment the positional parameters
 *    left, possibly none. It never takes named values.
 * 6. A capture parameter takes every named value whose key no positional or
 *    keyword parameter declares. Otherwise unused named values are ignored.
 * 7. Without `partial`, unused path segments make binding fail. With
 *    `partial`, they are left for the caller (see `consumed`).
 */

import { type AnyParam, type Coercer, type ParamList, countPositional } from './descriptor.js';
import { InvalidInputError } from './errors.js';
import type { ValueBag } from './value-bag.js';

/**
 * Outcome of a binding attempt.
 */
export type BindResult =
  | {
      ok: true;
      /** Bound values keyed by parameter name */
      args: Record<string, unknown>;
      /** Number of leading path segments used by positional parameters */
      consumed: number;
    }
  | {
      ok: false;
      reason: string;
    };

export interface BindOptions {
  /** Leave surplus path segments unbound instead of failing */
  partial?: boolean;
}

function failure(reason: string): BindResult {
  return { ok: false, reason };
}

/**
 * Bind arguments for a parameter list.
 *
 * @param params - Declared parameters, in order
 * @param segments - Path segments available for positional parameters
 * @param values - Named values from the query string and form body
 * @param options - Binding options
 *
 * @example
 * ```typescript
 * const params = [positional('topic', { coerce: int }), keyword('offset', { coerce: int, default: 0 })];
 *
 * bindArguments(params, ['10'], new Map([['offset', '20']]));
 * // { ok: true, args: { topic: 10, offset: 20 }, consumed: 1 }
 *
 * bindArguments(params, ['abc'], new Map());
 * // { ok: false, reason: "Invalid value for 'topic': Expected an integer, got 'abc'" }
 * ```
 */
export function bindArguments(
  params: ParamList,
  segments: readonly string[],
  values: ValueBag,
  options: BindOptions = {}
): BindResult {
  const takesRest = params.some((param) => param.kind === 'rest');
  if (!options.partial && !takesRest && segments.length > countPositional(params)) {
    const surplus = segments.slice(countPositional(params));
    return failure(`Unexpected path segments: ${surplus.join('/')}`);
  }

  const args: Record<string, unknown> = {};
  let cursor = 0;

  for (const param of params) {
    if (param.kind === 'capture') {
      args[param.name] = captureValues(params, values);
      continue;
    }

    if (param.kind === 'rest') {
      const items: unknown[] = [];
      for (const raw of segments.slice(cursor)) {
        const coerced = coerceValue(param.name, param.coerce, raw);
        if (!coerced.ok) {
          return coerced;
        }
        items.push(coerced.value);
      }
      args[param.name] = items;
      cursor = segments.length;
      continue;
    }

    let raw: string | undefined;

    if (param.kind === 'positional' && cursor < segments.length) {
      raw = segments[cursor];
      cursor++;
      if (values.has(param.name)) {
        return failure(`Parameter '${param.name}' given both in the path and by name`);
      }
    } else {
      raw = values.get(param.name);
    }

    if (raw === undefined) {
      if (param.fallback) {
        args[param.name] = param.fallback.value;
        continue;
      }
      return failure(`Missing required parameter '${param.name}'`);
    }

    const coerced = coerceValue(param.name, param.coerce, raw);
    if (!coerced.ok) {
      return coerced;
    }
    args[param.name] = coerced.value;
  }

  return { ok: true, args, consumed: cursor };
}

function coerceValue(
  name: string,
  coerce: Coercer<unknown>,
  raw: string
): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: coerce(raw) };
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return { ok: false, reason: `Invalid value for '${name}': ${error.message}` };
    }
    throw error;
  }
}

function isScalar(param: AnyParam): boolean {
  return param.kind === 'positional' || param.kind === 'keyword';
}

function captureValues(params: ParamList, values: ValueBag): Record<string, string> {
  const declared = new Set(params.filter(isScalar).map((param) => param.name));
  return Object.fromEntries([...values].filter(([key]) => !declared.has(key)));
}
