import { z } from "zod";

import { InvalidConfigError } from "./errors";
import { Field } from "./field";
import { getLogger } from "./logger";
import { parsePath } from "./path";
import {
  createFormContext,
  type FormContext,
  type FormContextInput,
} from "./request-context";
import type { RuleMessages } from "./rules";
import { Scope } from "./scope";

const logger = getLogger("create-form-bind");

const RESERVED_HELPER_NAMES = ["field", "fields", "context"];

const helperName = z
  .string()
  .regex(/^[A-Za-z_$][\w$]*$/, "must be a JavaScript identifier")
  .refine((name) => !RESERVED_HELPER_NAMES.includes(name), {
    error: `must not be one of ${RESERVED_HELPER_NAMES.join(", ")}`,
  });

export const formBindConfigSchema = z
  .object({
    methods: z
      .object({
        valid: helperName.default("valid"),
        errors: helperName.default("errors"),
      })
      .default({ valid: "valid", errors: "errors" }),
    messages: z
      .object({
        required: z.string(),
        equals: z.string(),
        matches: z.string(),
        length: z.string(),
        oneOf: z.string(),
        custom: z.string(),
      })
      .partial()
      .default({}),
  })
  .refine((config) => config.methods.valid !== config.methods.errors, {
    error: "valid and errors helpers need different names",
    path: ["methods"],
  });

export type FormBindConfig<
  TValid extends string = "valid",
  TErrors extends string = "errors",
> = {
  methods?: { valid?: TValid; errors?: TErrors };
  messages?: RuleMessages;
};

export type ValidQuery = (fieldName?: string) => boolean;

export type ErrorsQuery = {
  (): Record<string, string>;
  (fieldName: string): string | undefined;
};

export type FormHelpers<
  TValid extends string = "valid",
  TErrors extends string = "errors",
> = {
  context: FormContext;
  field: (path: string, root?: unknown) => Field;
  fields: (path: string, root?: unknown) => Scope;
} & Record<TValid, ValidQuery> &
  Record<TErrors, ErrorsQuery>;

export type FormBind<TValid extends string, TErrors extends string> = {
  methods: { valid: TValid; errors: TErrors };
  forRequest: (
    input?: Omit<FormContextInput, "messages">,
  ) => FormHelpers<TValid, TErrors>;
};

function namedHelper<TName extends string, THelper>(
  name: TName,
  helper: THelper,
): Record<TName, THelper> {
  // A computed key widens to `string`
  return { [name]: helper } as Record<TName, THelper>;
}

function hasConfiguredNames<TValid extends string, TErrors extends string>(
  methods: { valid: string; errors: string },
  config: FormBindConfig<TValid, TErrors>,
): methods is { valid: TValid; errors: TErrors } {
  return (
    methods.valid === (config.methods?.valid ?? "valid") &&
    methods.errors === (config.methods?.errors ?? "errors")
  );
}

// The explicit root only counts when the caller passed one, even `undefined`
function explicitRoot(
  rest: readonly [root?: unknown],
): { value: unknown } | undefined {
  return rest.length > 0 ? { value: rest[0] } : undefined;
}

/**
 * Installs formbind: validates the configuration once, then builds the
 * per-request helpers with `forRequest`.
 *
 * @example
 * const bind = createFormBind({ methods: { valid: "isValid" } });
 * const form = bind.forRequest({ stash: { user }, params });
 * form.field("user.name").required().text();
 * form.isValid();
 */
export function createFormBind<
  const TValid extends string = "valid",
  const TErrors extends string = "errors",
>(config: FormBindConfig<TValid, TErrors> = {}): FormBind<TValid, TErrors> {
  const parsed = formBindConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    logger.warn({ issues }, "invalid configuration");
    throw new InvalidConfigError(issues);
  }

  const { messages, methods } = parsed.data;
  if (!hasConfiguredNames(methods, config)) {
    throw new InvalidConfigError([
      `methods: resolved to ${methods.valid}/${methods.errors}`,
    ]);
  }
  const validName: TValid = methods.valid;
  const errorsName: TErrors = methods.errors;

  function forRequest(
    input: Omit<FormContextInput, "messages"> = {},
  ): FormHelpers<TValid, TErrors> {
    const context = createFormContext({ ...input, messages });

    function field(path: string, ...rest: [root?: unknown]): Field {
      return new Field(context, parsePath(path), explicitRoot(rest));
    }

    function fields(path: string, ...rest: [root?: unknown]): Scope {
      return new Scope(context, parsePath(path), explicitRoot(rest));
    }

    const valid: ValidQuery = (fieldName) => context.rules.isValid(fieldName);

    function errors(): Record<string, string>;
    function errors(fieldName: string): string | undefined;
    function errors(fieldName?: string) {
      return fieldName === undefined
        ? context.rules.errors()
        : context.rules.errorFor(fieldName);
    }

    return {
      context,
      field,
      fields,
      ...namedHelper(validName, valid),
      ...namedHelper(errorsName, errors),
    };
  }

  return { methods: { valid: validName, errors: errorsName }, forRequest };
}
