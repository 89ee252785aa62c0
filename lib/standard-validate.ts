import type { StandardSchemaV1 } from "@standard-schema/spec";

export type StandardParseResult<TOutput> =
  | { success: true; value: TOutput }
  | { success: false; issues: readonly StandardSchemaV1.Issue[] };

function runSync<TSchema extends StandardSchemaV1>(
  schema: TSchema,
  input: unknown,
): StandardSchemaV1.Result<StandardSchemaV1.InferOutput<TSchema>> {
  const result = schema["~standard"].validate(input);

  if (result instanceof Promise) {
    throw new TypeError("Schema validation must be synchronous");
  }

  return result;
}

export function standardValidate<TSchema extends StandardSchemaV1>(
  schema: TSchema,
  input: unknown,
) {
  const result = runSync(schema, input);

  if (!result.issues) {
    return;
  }

  return result.issues;
}

/**
 * Like `standardValidate`, but hands back the schema's output so transforms
 * (trimming, case folding) reach the caller.
 */
export function standardParse<TSchema extends StandardSchemaV1>(
  schema: TSchema,
  input: unknown,
): StandardParseResult<StandardSchemaV1.InferOutput<TSchema>> {
  const result = runSync(schema, input);

  if (result.issues) {
    return { success: false, issues: result.issues };
  }

  return { success: true, value: result.value };
}
