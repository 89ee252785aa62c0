/**
 * Turns a resolved value into the string a form control shows, or
 * `undefined` when there is nothing to show.
 */
export function formatValue(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return formatValue(value[0]);
  }

  switch (typeof value) {
    case "string": {
      return value;
    }
    case "number":
    case "bigint":
    case "boolean": {
      return String(value);
    }
    case "object": {
      if (value === null) {
        return undefined;
      }
      if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
      }
      // Only objects that say how they print
      return hasOwnToString(value) ? String(value) : undefined;
    }
    default: {
      return undefined;
    }
  }
}

/** Every shown value of a possibly multi-valued field, without repeats. */
export function formatValues(value: unknown): string[] {
  const items: readonly unknown[] = Array.isArray(value) ? value : [value];
  const formatted = items
    .map((item) => formatValue(item))
    .filter((item): item is string => item !== undefined);
  return [...new Set(formatted)];
}

function hasOwnToString(value: object): boolean {
  let current: object | null = value;
  while (current !== null && current !== Object.prototype) {
    if (Object.hasOwn(current, "toString")) {
      return true;
    }
    const next: object | null = Object.getPrototypeOf(current);
    current = next;
  }
  return false;
}
