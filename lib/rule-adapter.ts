import { getLogger } from "./logger";
import { parsePath } from "./path";
import { resolvePath, type Bindings } from "./resolve-path";
import {
  checkSchema,
  filterSchema,
  isEmptyValue,
  isFilter,
  messageFor,
  type CheckDeclaration,
  type RuleDeclaration,
  type RuleMessages,
} from "./rules";
import { standardParse, standardValidate } from "./standard-validate";

const logger = getLogger("rule-adapter");

export type ValidationResult = {
  valid: boolean;
  /** First failing message per field name */
  errors: Readonly<Record<string, string>>;
  /** Filtered value per field name */
  data: Readonly<Record<string, unknown>>;
};

/**
 * Collects rule declarations for one request and runs them on demand.
 *
 * A pass runs at most once: the result is kept until another rule is
 * declared. Rule evaluation itself goes through Standard Schema, with the
 * built-in rules compiled to zod schemas.
 */
export class RuleAdapter {
  private readonly declarations = new Map<string, RuleDeclaration[]>();
  private readonly roots = new Map<string, { value: unknown }>();
  private result: ValidationResult | undefined;

  constructor(
    private readonly bindings: Bindings,
    private readonly messages: RuleMessages = {},
  ) {}

  /**
   * Appends a rule for a field. `root` is the explicit root object the field
   * was resolved against, if any; validation reads the value through it.
   */
  addRule(
    fieldName: string,
    rule: RuleDeclaration,
    root?: { value: unknown },
  ): void {
    parsePath(fieldName);
    if (root) {
      this.roots.set(fieldName, root);
    }
    const rules = this.declarations.get(fieldName) ?? [];
    rules.push(rule);
    this.declarations.set(fieldName, rules);
    this.result = undefined;
  }

  fieldNames(): string[] {
    return [...this.declarations.keys()];
  }

  validate(): ValidationResult {
    if (this.result) {
      return this.result;
    }

    const data = new Map<string, unknown>();
    for (const [name, rules] of this.declarations) {
      data.set(name, this.filteredValue(name, rules));
    }

    const errors = new Map<string, string>();
    for (const [name, rules] of this.declarations) {
      const message = this.firstFailure(rules, data.get(name), data);
      if (message !== undefined) {
        errors.set(name, message);
      }
    }

    this.result = {
      valid: errors.size === 0,
      errors: Object.fromEntries(errors),
      data: Object.fromEntries(data),
    };

    logger.debug(
      { fields: this.declarations.size, invalid: errors.size },
      "validation pass finished",
    );

    return this.result;
  }

  errorFor(fieldName: string): string | undefined {
    const { errors } = this.validate();
    return Object.hasOwn(errors, fieldName) ? errors[fieldName] : undefined;
  }

  /** Without a name: whether every declared field passed. */
  isValid(fieldName?: string): boolean {
    const result = this.validate();
    if (fieldName === undefined) {
      return result.valid;
    }
    return !Object.hasOwn(result.errors, fieldName);
  }

  errors(): Record<string, string> {
    return { ...this.validate().errors };
  }

  private rawValue(fieldName: string): unknown {
    const resolution = resolvePath(
      parsePath(fieldName),
      this.bindings,
      this.roots.get(fieldName),
    );
    return resolution.status === "resolved" ? resolution.value : undefined;
  }

  private filteredValue(
    fieldName: string,
    rules: readonly RuleDeclaration[],
  ): unknown {
    let value = this.rawValue(fieldName);
    for (const rule of rules) {
      if (!isFilter(rule)) {
        continue;
      }
      const parsed = standardParse(filterSchema(rule.filter), value);
      if (!parsed.success) {
        throw new TypeError(`Filter rejected the value of '${fieldName}'`);
      }
      value = parsed.value;
    }
    return value;
  }

  private firstFailure(
    rules: readonly RuleDeclaration[],
    value: unknown,
    data: ReadonlyMap<string, unknown>,
  ): string | undefined {
    for (const rule of rules) {
      if (isFilter(rule) || skipsEmpty(rule, value)) {
        continue;
      }

      const message = messageFor(rule, this.messages);
      const other =
        rule.kind === "equals" ? this.valueOf(rule.other, data) : undefined;
      const issues = standardValidate(checkSchema(rule, message, other), value);
      if (!issues) {
        continue;
      }

      if (rule.kind === "custom" && typeof rule.check !== "function") {
        return rule.message ?? issues[0]?.message ?? message;
      }
      return message;
    }
    return undefined;
  }

  private valueOf(
    fieldName: string,
    data: ReadonlyMap<string, unknown>,
  ): unknown {
    return data.has(fieldName) ? data.get(fieldName) : this.rawValue(fieldName);
  }
}

function skipsEmpty(rule: CheckDeclaration, value: unknown): boolean {
  return rule.kind !== "required" && rule.kind !== "equals" && isEmptyValue(value);
}
