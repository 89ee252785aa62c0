import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";

import {
  idSuffix,
  toChoiceOption,
  toChoiceOptions,
  type Choice,
  type ChoiceGroup,
  type ChoiceOption,
  type ChoiceValue,
} from "./choices";
import { formatValue, formatValues } from "./format-value";
import { toElementProps, type FieldOptions } from "./html-attributes";

export type FieldKind =
  | "text"
  | "password"
  | "hidden"
  | "file"
  | "checkbox"
  | "radio"
  | "select"
  | "textarea"
  | "label"
  | "input";

type RenderBase = {
  name: string;
  id: string;
  /** Resolved field value; `undefined` when the path did not resolve */
  value: unknown;
  options?: FieldOptions | undefined;
};

export type RenderRequest = RenderBase &
  (
    | { kind: "text" | "password" | "hidden" | "file" | "textarea" }
    | { kind: "input"; type: string }
    | { kind: "checkbox" | "radio"; choice: ChoiceValue | readonly Choice[] }
    | { kind: "select"; choices: readonly (Choice | ChoiceGroup)[] }
    | { kind: "label"; text: string }
  );

// Keys each control takes from the options map instead of rendering them
const INPUT_RESERVED = ["id", "name", "type", "value"] as const;
const TEXTAREA_RESERVED = ["id", "name", "value", "size"] as const;
const SELECT_RESERVED = ["id", "name", "value"] as const;
const LABEL_RESERVED = ["for", "id"] as const;

function shownValue(value: unknown, options: FieldOptions | undefined) {
  const override = options?.value;
  if (override !== undefined && override !== null && typeof override !== "object") {
    return formatValue(override);
  }
  return formatValue(value);
}

function isChecked(value: unknown, choice: string): boolean {
  if (value === true) {
    return choice === "1" || choice === "true" || choice === "on";
  }
  return formatValues(value).includes(choice);
}

function textareaSize(size: unknown): { rows?: number; cols?: number } {
  if (typeof size !== "string") {
    return {};
  }
  const match = /^(\d+)x(\d+)$/.exec(size.trim());
  if (!match) {
    return {};
  }
  return { rows: Number(match[1]), cols: Number(match[2]) };
}

function TypedInput(props: {
  type: string;
  request: RenderBase;
  showValue: boolean;
}) {
  const { type, request, showValue } = props;
  const { props: attributes, style } = toElementProps(
    request.options,
    INPUT_RESERVED,
  );
  return (
    <input
      type={type}
      name={request.name}
      id={request.id}
      {...attributes}
      style={style}
      defaultValue={
        showValue ? shownValue(request.value, request.options) : undefined
      }
    />
  );
}

function CheckableInput(props: {
  type: "checkbox" | "radio";
  request: RenderBase;
  option: ChoiceOption;
  id: string;
}) {
  const { type, request, option, id } = props;
  const { props: attributes, style } = toElementProps(
    request.options,
    INPUT_RESERVED,
  );
  return (
    <input
      type={type}
      name={request.name}
      id={id}
      {...attributes}
      style={style}
      disabled={option.disabled || undefined}
      value={option.value}
      defaultChecked={isChecked(request.value, option.value)}
    />
  );
}

function Checkable(props: {
  type: "checkbox" | "radio";
  request: RenderBase;
  choice: ChoiceValue | readonly Choice[];
}): ReactElement {
  const { type, request, choice } = props;

  if (typeof choice === "string" || typeof choice === "number") {
    const option = toChoiceOption(choice);
    // A lone checkbox keeps the field id; radios share a name, so each
    // gets its own
    const id =
      type === "checkbox" ? request.id : `${request.id}-${idSuffix(choice)}`;
    return (
      <CheckableInput type={type} request={request} option={option} id={id} />
    );
  }

  return (
    <>
      {choice.map((item) => {
        const option = toChoiceOption(item);
        return (
          <label key={option.value}>
            <CheckableInput
              type={type}
              request={request}
              option={option}
              id={`${request.id}-${idSuffix(option.value)}`}
            />
            {option.label}
          </label>
        );
      })}
    </>
  );
}

function OptionItem(props: { option: ChoiceOption }) {
  const { option } = props;
  return (
    <option value={option.value} disabled={option.disabled || undefined}>
      {option.label}
    </option>
  );
}

function Select(props: {
  request: RenderBase;
  choices: readonly (Choice | ChoiceGroup)[];
}) {
  const { request, choices } = props;
  const { props: attributes, style } = toElementProps(
    request.options,
    SELECT_RESERVED,
  );
  const selected = formatValues(request.value);
  const multiple = attributes.multiple === true;

  return (
    <select
      name={request.name}
      id={request.id}
      {...attributes}
      style={style}
      defaultValue={multiple ? selected : selected[0]}
    >
      {toChoiceOptions(choices).map((entry) =>
        entry.type === "group" ? (
          <optgroup key={`group:${entry.label}`} label={entry.label}>
            {entry.options.map((option) => (
              <OptionItem key={option.value} option={option} />
            ))}
          </optgroup>
        ) : (
          <OptionItem key={entry.value} option={entry} />
        ),
      )}
    </select>
  );
}

function TextArea(props: { request: RenderBase }) {
  const { request } = props;
  const { props: attributes, style } = toElementProps(
    request.options,
    TEXTAREA_RESERVED,
  );
  const { rows, cols } = textareaSize(request.options?.size);
  return (
    <textarea
      name={request.name}
      id={request.id}
      rows={rows}
      cols={cols}
      {...attributes}
      style={style}
      defaultValue={shownValue(request.value, request.options)}
    />
  );
}

function Label(props: { request: RenderBase; text: string }) {
  const { request, text } = props;
  const { props: attributes, style } = toElementProps(
    request.options,
    LABEL_RESERVED,
  );
  const target = request.options?.for;
  return (
    <label
      htmlFor={typeof target === "string" ? target : request.id}
      {...attributes}
      style={style}
    >
      {text}
    </label>
  );
}

function FieldElement(props: { request: RenderRequest }): ReactElement {
  const { request } = props;
  switch (request.kind) {
    case "text":
    case "hidden": {
      return <TypedInput type={request.kind} request={request} showValue />;
    }
    case "password":
    case "file": {
      return (
        <TypedInput type={request.kind} request={request} showValue={false} />
      );
    }
    case "input": {
      return <TypedInput type={request.type} request={request} showValue />;
    }
    case "checkbox":
    case "radio": {
      return (
        <Checkable type={request.kind} request={request} choice={request.choice} />
      );
    }
    case "select": {
      return <Select request={request} choices={request.choices} />;
    }
    case "textarea": {
      return <TextArea request={request} />;
    }
    case "label": {
      return <Label request={request} text={request.text} />;
    }
  }
}

/**
 * Renders one form control to an HTML string. Attribute values and text are
 * escaped by React.
 */
export function renderField(request: RenderRequest): string {
  return renderToStaticMarkup(<FieldElement request={request} />);
}
