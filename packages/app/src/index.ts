export { decodeEntries, decodeJson, encodeJson, normalizeJson } from "./core/codec.js"
export type { EncodeOptions } from "./core/codec.js"
export {
  coerceAs,
  coerceBoolean,
  coerceByte,
  coerceChar,
  coerceDouble,
  coerceFloat,
  coerceInteger,
  coerceLong,
  coerceShort,
  coerceString,
  isTargetType,
  targetTypes
} from "./core/coerce.js"
export type { CoercedValue, TargetType } from "./core/coerce.js"
export { structuralEquals, structuralHash } from "./core/equality.js"
export { renderAppError } from "./core/errors.js"
export type { AppError, DecodeError, EncodeError, InvalidArgument } from "./core/errors.js"
export { jsonObjectFromEntries } from "./core/json.js"
export type { Json, JsonObject } from "./core/json.js"
export { JsonMap } from "./core/json-map.js"
export type { JsonMapOptions } from "./core/json-map.js"
export { byte, char, double, float, int, long, NativeChar, NativeNumber, short } from "./core/native.js"
export { defaultNarrowing } from "./core/numeric.js"
export type { NarrowingMode, NumericKind } from "./core/numeric.js"
export { classify } from "./core/scalar.js"
export type { Scalar } from "./core/scalar.js"
