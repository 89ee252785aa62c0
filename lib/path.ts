import { MissingFieldNameError } from "./errors";

/**
 * Ordered, non-empty list of non-empty tokens taken from a dotted name such
 * as `user.addresses.0.street`.
 */
export type FieldPath = readonly [string, ...string[]];

export function parsePath(raw: string | undefined): FieldPath {
  if (raw === undefined || raw.length === 0) {
    throw new MissingFieldNameError("no name given");
  }

  const [first, ...rest] = raw.split(".");
  if (first === undefined || first.length === 0 || rest.includes("")) {
    throw new MissingFieldNameError(`'${raw}' contains an empty segment`, {
      name: raw,
    });
  }

  return [first, ...rest];
}

export function joinPath(prefix: FieldPath, raw: string | undefined): FieldPath {
  const [first, ...rest] = parsePath(raw);
  return [...prefix, first, ...rest];
}

/** Form parameter name: tokens joined with `.` */
export function fieldName(path: FieldPath): string {
  return path.join(".");
}

/** DOM id: tokens joined with `-` */
export function fieldId(path: FieldPath): string {
  return path.join("-");
}

export function isIndexToken(token: string): boolean {
  return /^(?:0|[1-9]\d*)$/.test(token);
}

/**
 * Human label for a path: the last token that is not an index, underscores
 * turned into spaces, first letter upper-cased.
 */
export function labelText(path: FieldPath): string {
  const token =
    [...path].reverse().find((segment) => !isIndexToken(segment)) ?? path[0];
  const words = token.replaceAll("_", " ");
  return words.charAt(0).toUpperCase() + words.slice(1);
}
