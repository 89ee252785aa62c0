import type { StandardSchemaV1 } from "@standard-schema/spec";

import type { Choice, ChoiceGroup, ChoiceValue } from "./choices";
import { UnresolvedRootError } from "./errors";
import type { FieldOptions } from "./html-attributes";
import { getLogger } from "./logger";
import { fieldId, fieldName, labelText, type FieldPath } from "./path";
import { renderField, type RenderRequest } from "./render-field";
import type { FormContext } from "./request-context";
import { resolvePath, type Resolution } from "./resolve-path";
import type {
  FilterFn,
  FilterName,
  Predicate,
  RuleDeclaration,
} from "./rules";

const logger = getLogger("field");

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

type ControlRequest = DistributiveOmit<RenderRequest, "name" | "id" | "value" | "options">;

/**
 * Resolves a path against the request, throwing when the path names a root
 * object that was never bound. Anything deeper that fails to resolve is
 * treated as an empty value.
 */
export function resolveField(
  path: FieldPath,
  context: FormContext,
  root?: { value: unknown },
): Resolution {
  const resolution = resolvePath(path, context, root);
  if (
    resolution.status === "unresolved" &&
    resolution.reason === "missing-root" &&
    path.length > 1
  ) {
    const name = fieldName(path);
    logger.warn({ path: name, root: resolution.token }, "root object not found");
    throw new UnresolvedRootError(name, resolution.token);
  }
  return resolution;
}

/**
 * A form field bound to one dotted path.
 *
 * Rendering methods return HTML strings. Rule methods register validation
 * for this field's name and return the field, so they chain.
 */
export class Field {
  readonly path: FieldPath;
  readonly name: string;
  readonly id: string;
  private readonly resolution: Resolution;

  constructor(
    private readonly context: FormContext,
    path: FieldPath,
    private readonly root?: { value: unknown },
  ) {
    this.path = path;
    this.name = fieldName(path);
    this.id = fieldId(path);
    this.resolution = resolveField(path, context, root);
  }

  get resolved(): boolean {
    return this.resolution.status === "resolved";
  }

  /** The resolved value, or `undefined` when the path did not resolve. */
  get value(): unknown {
    return this.resolution.status === "resolved"
      ? this.resolution.value
      : undefined;
  }

  get source(): "params" | "object" | undefined {
    return this.resolution.status === "resolved"
      ? this.resolution.source
      : undefined;
  }

  // =====================================
  // Rendering
  // =====================================

  text(options?: FieldOptions): string {
    return this.render({ kind: "text" }, options);
  }

  password(options?: FieldOptions): string {
    return this.render({ kind: "password" }, options);
  }

  hidden(options?: FieldOptions): string {
    return this.render({ kind: "hidden" }, options);
  }

  file(options?: FieldOptions): string {
    return this.render({ kind: "file" }, options);
  }

  input(type: string, options?: FieldOptions): string {
    return this.render({ kind: "input", type }, options);
  }

  textarea(options?: FieldOptions): string {
    return this.render({ kind: "textarea" }, options);
  }

  /**
   * A single checkbox submitting `choice` (default `"1"`), or one labelled
   * checkbox per entry when given a list.
   */
  checkbox(
    choice: ChoiceValue | readonly Choice[] = "1",
    options?: FieldOptions,
  ): string {
    return this.render({ kind: "checkbox", choice }, options);
  }

  radio(choice: ChoiceValue | readonly Choice[], options?: FieldOptions): string {
    return this.render({ kind: "radio", choice }, options);
  }

  select(
    choices: readonly (Choice | ChoiceGroup)[],
    options?: FieldOptions,
  ): string {
    return this.render({ kind: "select", choices }, options);
  }

  label(text?: string, options?: FieldOptions): string {
    return this.render({ kind: "label", text: text ?? labelText(this.path) }, options);
  }

  // =====================================
  // Validation
  // =====================================

  required(message?: string): this {
    return this.addRule({ kind: "required", message });
  }

  equals(otherField: string, message?: string): this {
    return this.addRule({ kind: "equals", other: otherField, message });
  }

  matches(pattern: RegExp, message?: string): this {
    return this.addRule({ kind: "matches", pattern, message });
  }

  minLength(min: number, message?: string): this {
    return this.addRule({ kind: "length", min, message });
  }

  maxLength(max: number, message?: string): this {
    return this.addRule({ kind: "length", max, message });
  }

  lengthBetween(min: number, max: number, message?: string): this {
    return this.addRule({ kind: "length", min, max, message });
  }

  oneOf(values: readonly ChoiceValue[], message?: string): this {
    return this.addRule({
      kind: "oneOf",
      values: values.map((value) => String(value)),
      message,
    });
  }

  /** Any Standard Schema (zod, valibot ...) or a predicate. */
  check(check: StandardSchemaV1 | Predicate, message?: string): this {
    return this.addRule({ kind: "custom", check, message });
  }

  filter(filter: FilterName | FilterFn): this {
    return this.addRule({ kind: "filter", filter });
  }

  valid(): boolean {
    return this.context.rules.isValid(this.name);
  }

  error(): string | undefined {
    return this.context.rules.errorFor(this.name);
  }

  private addRule(rule: RuleDeclaration): this {
    this.context.rules.addRule(this.name, rule, this.root);
    return this;
  }

  private render(control: ControlRequest, options: FieldOptions | undefined): string {
    const id = typeof options?.id === "string" ? options.id : this.id;
    return renderField({
      ...control,
      name: this.name,
      id,
      value: this.value,
      options,
    });
  }
}
