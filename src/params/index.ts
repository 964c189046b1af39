/**
 * Parameters module.
 *
 * Descriptors, coercers, the value bag and the binder.
 */

export { type BindOptions, type BindResult, bindArguments } from './binder.js';
export { bool, float, int, matching, oneOf } from './coerce.js';
export {
  type AnyParam,
  type BoundArgs,
  type CaptureParam,
  type CapturedValues,
  capture,
  type CoercedParamOptions,
  type Coercer,
  countPositional,
  keyword,
  type ParamDescriptor,
  type ParamKind,
  type ParamList,
  type ParamValue,
  type PlainParamOptions,
  positional,
  rest,
  type RestParam,
  type ScalarParam,
  takesSegments,
} from './descriptor.js';
export { InvalidInputError } from './errors.js';
export { EMPTY_VALUES, mergeValues, toValueBag, type ValueBag, type ValueSource } from './value-bag.js';
