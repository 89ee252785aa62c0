export type AttributeValue = string | number | boolean | null | undefined;

export type DataAttributes = Readonly<Record<string, AttributeValue>>;

/**
 * Extra attributes for a rendered control, keyed by their HTML names.
 * `data` expands to `data-*` attributes.
 */
export type FieldOptions = {
  readonly data?: DataAttributes;
  readonly [attribute: string]: AttributeValue | DataAttributes;
};

export type ElementProps = Record<string, string | number | boolean>;

// HTML attribute name -> React prop name
const ATTRIBUTE_ALIASES: Readonly<Record<string, string>> = {
  accesskey: "accessKey",
  autocomplete: "autoComplete",
  autofocus: "autoFocus",
  class: "className",
  contenteditable: "contentEditable",
  enterkeyhint: "enterKeyHint",
  for: "htmlFor",
  formnovalidate: "formNoValidate",
  inputmode: "inputMode",
  maxlength: "maxLength",
  minlength: "minLength",
  novalidate: "noValidate",
  readonly: "readOnly",
  spellcheck: "spellCheck",
  tabindex: "tabIndex",
};

// Props React renders as present/absent attributes
const BOOLEAN_PROPS = new Set([
  "autoFocus",
  "disabled",
  "formNoValidate",
  "hidden",
  "multiple",
  "noValidate",
  "readOnly",
  "required",
]);

// Never forwarded: React would treat them as content
const BLOCKED_KEYS = new Set(["children", "dangerouslySetInnerHTML", "key", "ref"]);

function toKebabCase(key: string): string {
  return key.replaceAll(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

function isDataAttributes(
  value: AttributeValue | DataAttributes,
): value is DataAttributes {
  return typeof value === "object" && value !== null;
}

function stringifyFreeform(value: AttributeValue): string | undefined {
  return value === null || value === undefined ? undefined : String(value);
}

/**
 * Parses an inline `style` string into the object React expects.
 * Declarations without a colon are dropped.
 */
export function parseStyle(style: string): Record<string, string> {
  const declarations: [string, string][] = [];
  for (const declaration of style.split(";")) {
    const colon = declaration.indexOf(":");
    if (colon === -1) {
      continue;
    }
    const property = declaration.slice(0, colon).trim();
    const value = declaration.slice(colon + 1).trim();
    if (property && value) {
      declarations.push([property, value]);
    }
  }
  return Object.fromEntries(declarations);
}

export type AttributeProps = {
  props: ElementProps;
  style: Record<string, string> | undefined;
};

/**
 * Converts an options map into React props, leaving out the keys the
 * calling control consumes itself.
 */
export function toElementProps(
  options: FieldOptions | undefined,
  reserved: readonly string[] = [],
): AttributeProps {
  const entries: [string, string | number | boolean][] = [];
  let style: Record<string, string> | undefined;

  for (const [key, raw] of Object.entries(options ?? {})) {
    if (reserved.includes(key) || BLOCKED_KEYS.has(key)) {
      continue;
    }

    if (key === "data" && isDataAttributes(raw)) {
      for (const [dataKey, dataValue] of Object.entries(raw)) {
        const text = stringifyFreeform(dataValue);
        if (text !== undefined) {
          entries.push([`data-${toKebabCase(dataKey)}`, text]);
        }
      }
      continue;
    }

    if (isDataAttributes(raw) || raw === null || raw === undefined || raw === false) {
      continue;
    }

    if (key === "style" && typeof raw === "string") {
      style = parseStyle(raw);
      continue;
    }

    if (key.startsWith("data-") || key.startsWith("aria-")) {
      entries.push([key, String(raw)]);
      continue;
    }

    const prop = ATTRIBUTE_ALIASES[key.toLowerCase()] ?? key;
    if (raw === true) {
      entries.push([prop, BOOLEAN_PROPS.has(prop) ? true : ""]);
      continue;
    }
    entries.push([prop, raw]);
  }

  return { props: Object.fromEntries(entries), style };
}
