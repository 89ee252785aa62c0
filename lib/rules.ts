import type { StandardSchemaV1 } from "@standard-schema/spec";
import { z } from "zod";

export type FilterName =
  | "trim"
  | "strip"
  | "lowercase"
  | "uppercase"
  | "capitalize";

export type FilterFn = (value: unknown) => unknown;

export type Predicate = (value: unknown) => boolean;

export type RuleDeclaration =
  | { kind: "required"; message?: string }
  | { kind: "equals"; other: string; message?: string }
  | { kind: "matches"; pattern: RegExp; message?: string }
  | { kind: "length"; min?: number; max?: number; message?: string }
  | { kind: "oneOf"; values: readonly string[]; message?: string }
  | {
      kind: "custom";
      check: StandardSchemaV1 | Predicate;
      message?: string;
    }
  | { kind: "filter"; filter: FilterName | FilterFn };

export type CheckDeclaration = Exclude<RuleDeclaration, { kind: "filter" }>;
export type FilterDeclaration = Extract<RuleDeclaration, { kind: "filter" }>;

export type RuleKind = CheckDeclaration["kind"];

export type RuleMessages = Partial<Record<RuleKind, string>>;

export const DEFAULT_MESSAGES = {
  required: "Required",
  equals: "Does not match {other}",
  matches: "Invalid format",
  length: "Invalid length",
  oneOf: "Not a valid choice",
  custom: "Invalid value",
} as const satisfies Record<RuleKind, string>;

export function isFilter(rule: RuleDeclaration): rule is FilterDeclaration {
  return rule.kind === "filter";
}

export function isEmptyValue(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === "" ||
    (Array.isArray(value) && value.length === 0)
  );
}

function mapStrings(value: unknown, fn: (text: string) => string): unknown {
  if (typeof value === "string") {
    return fn(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) =>
      typeof item === "string" ? fn(item) : item,
    );
  }
  return value;
}

const NAMED_FILTERS: Record<FilterName, (text: string) => string> = {
  trim: (text) => text.trim(),
  strip: (text) => text.replaceAll(/\s+/g, " ").trim(),
  lowercase: (text) => text.toLowerCase(),
  uppercase: (text) => text.toUpperCase(),
  capitalize: (text) => text.charAt(0).toUpperCase() + text.slice(1),
};

export function filterSchema(
  filter: FilterName | FilterFn,
): StandardSchemaV1<unknown, unknown> {
  if (typeof filter === "function") {
    return z.unknown().transform((value) => filter(value));
  }
  const fn = NAMED_FILTERS[filter];
  return z.unknown().transform((value) => mapStrings(value, fn));
}

function formatMessage(
  template: string,
  params: Record<string, string | number>,
): string {
  return template.replaceAll(/\{(\w+)\}/g, (match, key: string) => {
    const param = params[key];
    return param === undefined ? match : String(param);
  });
}

function lengthMessage(min: number | undefined, max: number | undefined) {
  if (min !== undefined && max !== undefined) {
    return `Must be between ${min} and ${max} characters`;
  }
  if (min !== undefined) {
    return `Must be at least ${min} characters`;
  }
  if (max !== undefined) {
    return `Must be at most ${max} characters`;
  }
  return DEFAULT_MESSAGES.length;
}

export function messageFor(
  rule: CheckDeclaration,
  overrides: RuleMessages,
): string {
  if (rule.message !== undefined) {
    return rule.message;
  }
  const override = overrides[rule.kind];
  switch (rule.kind) {
    case "equals": {
      return formatMessage(override ?? DEFAULT_MESSAGES.equals, {
        other: rule.other,
      });
    }
    case "length": {
      return override === undefined
        ? lengthMessage(rule.min, rule.max)
        : formatMessage(override, { min: rule.min ?? "", max: rule.max ?? "" });
    }
    default: {
      return override ?? DEFAULT_MESSAGES[rule.kind];
    }
  }
}

function asText(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => asText(item)).join(",");
  }
  return isEmptyValue(value) ? "" : String(value);
}

export function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return (
      a.length === b.length &&
      a.every((item: unknown, index) => sameValue(item, b[index]))
    );
  }
  return asText(a) === asText(b);
}

/**
 * Compiles a check into the Standard Schema the validator runs.
 * `other` carries the value an `equals` rule compares against.
 */
export function checkSchema(
  rule: CheckDeclaration,
  message: string,
  other?: unknown,
): StandardSchemaV1 {
  switch (rule.kind) {
    case "required": {
      return z.unknown().refine((value) => !isEmptyValue(value), {
        error: message,
      });
    }
    case "equals": {
      return z.unknown().refine((value) => sameValue(value, other), {
        error: message,
      });
    }
    case "matches": {
      // Stateful flags would make repeated tests disagree
      const pattern = new RegExp(
        rule.pattern.source,
        rule.pattern.flags.replaceAll(/[gy]/g, ""),
      );
      return z.unknown().refine(
        (value) => everyText(value, (text) => pattern.test(text)),
        { error: message },
      );
    }
    case "length": {
      const { min = 0, max = Number.POSITIVE_INFINITY } = rule;
      return z.unknown().refine(
        (value) =>
          everyText(value, (text) => text.length >= min && text.length <= max),
        { error: message },
      );
    }
    case "oneOf": {
      const allowed = new Set(rule.values);
      return z.unknown().refine(
        (value) => everyText(value, (text) => allowed.has(text)),
        { error: message },
      );
    }
    case "custom": {
      const { check } = rule;
      if (typeof check === "function") {
        return z.unknown().refine((value) => check(value), { error: message });
      }
      return check;
    }
  }
}

function everyText(value: unknown, test: (text: string) => boolean): boolean {
  const items: readonly unknown[] = Array.isArray(value) ? value : [value];
  return items.every((item) => test(asText(item)));
}
