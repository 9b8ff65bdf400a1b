export { Field, FieldSchema, compact, isField, assertField, describeValue, type FieldOptions } from "./base"
export { FieldError, FieldWarning, ResolutionFieldError, prefixPointer, type Validation } from "./issues"
export {
  Anything,
  Hashable,
  Boolean,
  Integer,
  Float,
  UnicodeString,
  ByteString,
  UnicodeDecimal,
  Constant,
  Null,
  Nullable,
  isHashable,
  boundErrors,
  type HashableValue,
  type BoundOptions,
  type NumberOptions,
  type StringOptions,
  type ConstantValue,
} from "./basic"
export { DateTime, type DateTimeOptions } from "./temporal"
export {
  List,
  Set,
  Tuple,
  Dictionary,
  SchemalessDictionary,
  type SizeOptions,
  type DictionaryOptions,
  type DictionaryExtension,
  type SchemalessDictionaryOptions,
} from "./structures"
export {
  Polymorph,
  Any,
  All,
  BooleanValidator,
  ObjectInstance,
  TypeReference,
  DEFAULT_BRANCH,
  isSubclass,
  type BooleanValidatorOptions,
  type TypeReferenceOptions,
} from "./meta"
export { Deprecated, type DeprecatedOptions } from "./modifiers"
