import type { StandardSchemaV1 } from "@standard-schema/spec";

import type { Choice, ChoiceGroup, ChoiceValue } from "./choices";
import { MissingFieldNameError, NotACollectionError } from "./errors";
import { Field, resolveField } from "./field";
import type { FieldOptions } from "./html-attributes";
import { fieldName, joinPath, type FieldPath } from "./path";
import type { FormContext } from "./request-context";
import type { Resolution } from "./resolve-path";
import type { FilterFn, FilterName, Predicate } from "./rules";

type ElementPosition = { index: number; object: unknown };

/**
 * A group of fields under a common path prefix, such as `user` or
 * `user.orders.0`. Every operation takes the field name relative to the
 * prefix.
 */
export class Scope implements Iterable<Scope> {
  readonly path: FieldPath;
  readonly name: string;
  private readonly resolution: Resolution;

  constructor(
    private readonly context: FormContext,
    path: FieldPath,
    private readonly root?: { value: unknown },
    private readonly position?: ElementPosition,
  ) {
    this.path = path;
    this.name = fieldName(path);
    this.resolution = resolveField(path, context, root);
  }

  /** The value the prefix resolves to, or `undefined`. */
  get value(): unknown {
    return this.resolution.status === "resolved"
      ? this.resolution.value
      : undefined;
  }

  /** Position of this scope in the collection being iterated. */
  index(): number | undefined {
    return this.position?.index;
  }

  /** Element of the collection being iterated. */
  object(): unknown {
    return this.position ? this.position.object : this.value;
  }

  field(name: string): Field {
    return new Field(this.context, this.childPath(name), this.root);
  }

  fields(name: string): Scope {
    return new Scope(this.context, this.childPath(name), this.root);
  }

  each(fn: (element: Scope, index: number) => void): void {
    let index = 0;
    for (const element of this) {
      fn(element, index);
      index += 1;
    }
  }

  *[Symbol.iterator](): Iterator<Scope> {
    const collection = this.value;
    if (collection === undefined || collection === null) {
      return;
    }
    if (!Array.isArray(collection)) {
      throw new NotACollectionError(this.name, describe(collection));
    }
    for (const [index, object] of collection.entries()) {
      yield new Scope(
        this.context,
        [...this.path, String(index)],
        this.root,
        { index, object },
      );
    }
  }

  text(name: string, options?: FieldOptions): string {
    return this.field(name).text(options);
  }

  password(name: string, options?: FieldOptions): string {
    return this.field(name).password(options);
  }

  hidden(name: string, options?: FieldOptions): string {
    return this.field(name).hidden(options);
  }

  file(name: string, options?: FieldOptions): string {
    return this.field(name).file(options);
  }

  input(name: string, type: string, options?: FieldOptions): string {
    return this.field(name).input(type, options);
  }

  textarea(name: string, options?: FieldOptions): string {
    return this.field(name).textarea(options);
  }

  checkbox(
    name: string,
    choice?: ChoiceValue | readonly Choice[],
    options?: FieldOptions,
  ): string {
    return this.field(name).checkbox(choice, options);
  }

  radio(
    name: string,
    choice: ChoiceValue | readonly Choice[],
    options?: FieldOptions,
  ): string {
    return this.field(name).radio(choice, options);
  }

  select(
    name: string,
    choices: readonly (Choice | ChoiceGroup)[],
    options?: FieldOptions,
  ): string {
    return this.field(name).select(choices, options);
  }

  label(name: string, text?: string, options?: FieldOptions): string {
    return this.field(name).label(text, options);
  }

  required(name: string, message?: string): this {
    this.field(name).required(message);
    return this;
  }

  equals(name: string, otherField: string, message?: string): this {
    this.field(name).equals(otherField, message);
    return this;
  }

  matches(name: string, pattern: RegExp, message?: string): this {
    this.field(name).matches(pattern, message);
    return this;
  }

  minLength(name: string, min: number, message?: string): this {
    this.field(name).minLength(min, message);
    return this;
  }

  maxLength(name: string, max: number, message?: string): this {
    this.field(name).maxLength(max, message);
    return this;
  }

  lengthBetween(name: string, min: number, max: number, message?: string): this {
    this.field(name).lengthBetween(min, max, message);
    return this;
  }

  oneOf(name: string, values: readonly ChoiceValue[], message?: string): this {
    this.field(name).oneOf(values, message);
    return this;
  }

  check(
    name: string,
    check: StandardSchemaV1 | Predicate,
    message?: string,
  ): this {
    this.field(name).check(check, message);
    return this;
  }

  filter(name: string, filter: FilterName | FilterFn): this {
    this.field(name).filter(filter);
    return this;
  }

  /** Without a name: whether every declared field under this prefix passed. */
  valid(name?: string): boolean {
    if (name !== undefined) {
      return this.field(name).valid();
    }
    const prefix = `${this.name}.`;
    return this.context.rules
      .fieldNames()
      .filter((declared) => declared.startsWith(prefix))
      .every((declared) => this.context.rules.isValid(declared));
  }

  error(name: string): string | undefined {
    return this.field(name).error();
  }

  private childPath(name: string): FieldPath {
    // Untyped callers can still omit the name
    if (typeof name !== "string" || name.length === 0) {
      throw new MissingFieldNameError(
        `'${this.name}' needs a field name for this operation`,
        { scope: this.name },
      );
    }
    return joinPath(this.path, name);
  }
}

function describe(value: unknown): string {
  if (typeof value !== "object" || value === null) {
    return typeof value;
  }
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "object";
}
