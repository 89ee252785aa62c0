import { getLogger } from "./logger";
import { fieldName, isIndexToken, type FieldPath } from "./path";

const logger = getLogger("resolve-path");

export type SubmittedValue = string | readonly string[];

/**
 * The read-only inputs of one request: values bound by the application
 * (the "stash") and the submitted form parameters keyed by flattened
 * dotted name.
 */
export type Bindings = {
  readonly stash: Readonly<Record<string, unknown>>;
  readonly params: Readonly<Record<string, SubmittedValue>>;
};

export type Resolution =
  | { status: "resolved"; value: unknown; source: "params" | "object" }
  | {
      status: "unresolved";
      reason: "missing-root" | "missing-token";
      token: string;
    };

export type TokenLookup = { found: true; value: unknown } | { found: false };

/**
 * Objects may take over token lookup by implementing this method. It is
 * consulted before the generic accessor lookup.
 */
export const resolveToken: unique symbol = Symbol("formbind.resolveToken");

export type TokenResolvable = {
  [resolveToken](token: string): TokenLookup;
};

type TokenAdapter = {
  name: string;
  accepts(current: unknown, token: string): boolean;
  apply(current: unknown, token: string): TokenLookup;
};

const NOT_FOUND: TokenLookup = { found: false };

// Never walk into the prototype chain through a path
const TOKEN_BLOCKLIST = new Set(["__proto__", "constructor", "prototype"]);

function isObjectLike(value: unknown): value is object {
  return (
    (typeof value === "object" && value !== null) ||
    typeof value === "function"
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isTokenResolvable(value: unknown): value is TokenResolvable {
  return isObjectLike(value) && resolveToken in value;
}

const sequenceAdapter: TokenAdapter = {
  name: "sequence",
  accepts: (current, token) => Array.isArray(current) && isIndexToken(token),
  apply(current, token) {
    if (!Array.isArray(current)) {
      return NOT_FOUND;
    }
    const index = Number(token);
    if (index >= current.length) {
      return NOT_FOUND;
    }
    const value: unknown = current[index];
    return { found: true, value };
  },
};

const mappingAdapter: TokenAdapter = {
  name: "mapping",
  accepts: (current) => current instanceof Map || isPlainObject(current),
  apply(current, token) {
    if (current instanceof Map) {
      return current.has(token)
        ? { found: true, value: current.get(token) }
        : NOT_FOUND;
    }
    if (isPlainObject(current) && Object.hasOwn(current, token)) {
      return { found: true, value: current[token] };
    }
    return NOT_FOUND;
  },
};

const customAdapter: TokenAdapter = {
  name: "custom",
  accepts: isTokenResolvable,
  apply: (current, token) =>
    isTokenResolvable(current) ? current[resolveToken](token) : NOT_FOUND,
};

// Members found on these prototypes never resolve
const BUILTIN_PROTOTYPES: ReadonlySet<object> = new Set<object>([
  Object.prototype,
  Function.prototype,
  Array.prototype,
  Date.prototype,
  Map.prototype,
  Set.prototype,
  WeakMap.prototype,
  WeakSet.prototype,
  RegExp.prototype,
  Promise.prototype,
  Error.prototype,
]);

function memberOwner(value: object, token: string): object | undefined {
  let current: object | null = value;
  while (current !== null) {
    if (Object.hasOwn(current, token)) {
      return current;
    }
    const next: object | null = Object.getPrototypeOf(current);
    current = next;
  }
  return undefined;
}

const accessorAdapter: TokenAdapter = {
  name: "accessor",
  accepts: isObjectLike,
  apply(current, token) {
    if (!isObjectLike(current)) {
      return NOT_FOUND;
    }
    const owner = memberOwner(current, token);
    if (owner === undefined || BUILTIN_PROTOTYPES.has(owner)) {
      return NOT_FOUND;
    }
    const member: unknown = Reflect.get(current, token);
    if (typeof member === "function") {
      const value: unknown = Reflect.apply(member, current, []);
      return { found: true, value };
    }
    return { found: true, value: member };
  },
};

/**
 * Adapters in the order they are tried. The first one that accepts the
 * current value decides the outcome for the token.
 */
const TOKEN_ADAPTERS: readonly TokenAdapter[] = [
  sequenceAdapter,
  mappingAdapter,
  customAdapter,
  accessorAdapter,
];

export function applyToken(current: unknown, token: string): TokenLookup {
  if (TOKEN_BLOCKLIST.has(token)) {
    return NOT_FOUND;
  }
  const adapter = TOKEN_ADAPTERS.find((candidate) =>
    candidate.accepts(current, token),
  );
  return adapter ? adapter.apply(current, token) : NOT_FOUND;
}

/**
 * Resolves a path against the request bindings.
 *
 * A submitted parameter at the full dotted name wins over whatever the bound
 * objects hold, so a re-rendered form shows what the user typed. Otherwise
 * the first token selects the root (the explicit root when given, else the
 * stash entry) and every further token is applied to the current value.
 */
export function resolvePath(
  path: FieldPath,
  bindings: Bindings,
  explicitRoot?: { value: unknown },
): Resolution {
  const name = fieldName(path);
  if (Object.hasOwn(bindings.params, name)) {
    return { status: "resolved", value: bindings.params[name], source: "params" };
  }

  const [rootToken, ...tokens] = path;
  let current: unknown;
  if (explicitRoot) {
    current = explicitRoot.value;
  } else if (Object.hasOwn(bindings.stash, rootToken)) {
    current = bindings.stash[rootToken];
  } else {
    return { status: "unresolved", reason: "missing-root", token: rootToken };
  }

  for (const token of tokens) {
    const lookup = applyToken(current, token);
    if (!lookup.found) {
      logger.debug({ path: name, token }, "path token did not resolve");
      return { status: "unresolved", reason: "missing-token", token };
    }
    current = lookup.value;
  }

  return { status: "resolved", value: current, source: "object" };
}
