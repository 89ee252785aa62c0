import type { Bindings, SubmittedValue } from "./resolve-path";
import { RuleAdapter } from "./rule-adapter";
import type { RuleMessages } from "./rules";

/**
 * Everything formbind knows about one request. Created per request and
 * dropped with it; nothing here is shared between requests.
 */
export type FormContext = Bindings & {
  readonly rules: RuleAdapter;
};

export type FormContextInput = {
  stash?: Readonly<Record<string, unknown>>;
  params?: Readonly<Record<string, SubmittedValue>> | URLSearchParams;
  messages?: RuleMessages;
};

export function createFormContext(input: FormContextInput = {}): FormContext {
  const { stash = {}, params = {}, messages } = input;
  const bindings: Bindings = {
    stash,
    params: params instanceof URLSearchParams ? paramsFromSearch(params) : params,
  };
  return { ...bindings, rules: new RuleAdapter(bindings, messages) };
}

/**
 * Flattens query-string style input into submitted parameters. A name seen
 * once maps to its string; a repeated name maps to every value in order.
 */
export function paramsFromSearch(
  input: URLSearchParams | string,
): Record<string, SubmittedValue> {
  const search =
    typeof input === "string" ? new URLSearchParams(input) : input;
  const params = new Map<string, string[]>();
  for (const [name, value] of search) {
    const values = params.get(name) ?? [];
    values.push(value);
    params.set(name, values);
  }

  return Object.fromEntries(
    [...params].map(([name, values]): [string, SubmittedValue] => {
      const [first] = values;
      return [name, values.length === 1 && first !== undefined ? first : values];
    }),
  );
}
