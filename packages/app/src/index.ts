export type { Encodable, EncodableRecord, Heterogeneous, Jsonizable } from "./core/encodable.js"
export { heterogeneous } from "./core/encodable.js"
export { encode, encodeUnknown } from "./core/encode.js"
export type { EnumDefinition, EnumMember, Enumeration, EnumTable, EnumValue } from "./core/enumeration.js"
export { makeEnumeration } from "./core/enumeration.js"
export type {
  AppError,
  EncodeError,
  IntegerOutOfRange,
  IoFailure,
  ParseError,
  UnsupportedKeyType,
  UnsupportedShape
} from "./core/errors.js"
export { formatAppError } from "./core/errors.js"
export type {
  JsonArray,
  JsonBool,
  JsonFloat,
  JsonInt,
  JsonNull,
  JsonObject,
  JsonString,
  JsonUInt,
  JsonValueTag
} from "./core/json-value.js"
export { JsonValue } from "./core/json-value.js"
export { jsonizeFields } from "./core/jsonize.js"
export { parseJsonText } from "./core/parse.js"
export { render, toJsonString } from "./core/render.js"
export { writeJson, writeJsonFile, writeTextFile } from "./shell/sink.js"
export { readJsonFile } from "./shell/source.js"
