export {
  createFormBind,
  formBindConfigSchema,
  type ErrorsQuery,
  type FormBind,
  type FormBindConfig,
  type FormHelpers,
  type ValidQuery,
} from "./create-form-bind";
export type {
  Choice,
  ChoiceGroup,
  ChoiceValue,
} from "./choices";
export {
  FormBindError,
  InvalidConfigError,
  MissingFieldNameError,
  NotACollectionError,
  UnresolvedRootError,
} from "./errors";
export { Field } from "./field";
export type { AttributeValue, FieldOptions } from "./html-attributes";
export { getLogger, type Logger } from "./logger";
export { fieldId, fieldName, parsePath, type FieldPath } from "./path";
export { renderField, type FieldKind, type RenderRequest } from "./render-field";
export {
  createFormContext,
  paramsFromSearch,
  type FormContext,
  type FormContextInput,
} from "./request-context";
export {
  resolvePath,
  resolveToken,
  type Bindings,
  type Resolution,
  type SubmittedValue,
  type TokenLookup,
  type TokenResolvable,
} from "./resolve-path";
export { RuleAdapter, type ValidationResult } from "./rule-adapter";
export type {
  FilterFn,
  FilterName,
  Predicate,
  RuleDeclaration,
  RuleKind,
  RuleMessages,
} from "./rules";
export { Scope } from "./scope";
