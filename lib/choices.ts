export type ChoiceValue = string | number;

/**
 * One selectable value: a bare value (label and value alike), a
 * `[label, value]` pair, or an object form that can also disable it.
 */
export type Choice =
  | ChoiceValue
  | readonly [label: string, value: ChoiceValue]
  | { readonly label: string; readonly value: ChoiceValue; readonly disabled?: boolean };

export type ChoiceGroup = {
  readonly group: string;
  readonly choices: readonly Choice[];
};

export type ChoiceOption = {
  type: "option";
  label: string;
  value: string;
  disabled: boolean;
};

export type ChoiceOptionGroup = {
  type: "group";
  label: string;
  options: ChoiceOption[];
};

function isChoiceGroup(choice: Choice | ChoiceGroup): choice is ChoiceGroup {
  return typeof choice === "object" && "group" in choice;
}

export function toChoiceOption(choice: Choice): ChoiceOption {
  if (typeof choice === "string" || typeof choice === "number") {
    const value = String(choice);
    return { type: "option", label: value, value, disabled: false };
  }
  if ("label" in choice) {
    return {
      type: "option",
      label: choice.label,
      value: String(choice.value),
      disabled: choice.disabled ?? false,
    };
  }
  const [label, value] = choice;
  return { type: "option", label, value: String(value), disabled: false };
}

export function toChoiceOptions(
  choices: readonly (Choice | ChoiceGroup)[],
): (ChoiceOption | ChoiceOptionGroup)[] {
  return choices.map((choice) =>
    isChoiceGroup(choice)
      ? {
          type: "group",
          label: choice.group,
          options: choice.choices.map((inner) => toChoiceOption(inner)),
        }
      : toChoiceOption(choice),
  );
}

/** Reduces a value to characters safe inside a DOM id. */
export function idSuffix(value: ChoiceValue): string {
  return String(value).replaceAll(/[^A-Za-z0-9_-]/g, "-");
}
