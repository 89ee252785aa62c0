import { describe, it, expect } from "vitest";
import { createFormContext, paramsFromSearch } from "@lib/request-context";
import { RuleAdapter } from "@lib/rule-adapter";

describe(paramsFromSearch, () => {
  it("keeps single values as strings and collects repeated names", () => {
    expect.hasAssertions();

    expect(paramsFromSearch("user.name=Ada&tags=a&tags=b&empty=")).toStrictEqual({
      "user.name": "Ada",
      tags: ["a", "b"],
      empty: "",
    });
  });

  it("takes names that would touch the prototype as plain keys", () => {
    expect.hasAssertions();

    const params = paramsFromSearch(new URLSearchParams("__proto__=x"));

    expect(Object.hasOwn(params, "__proto__")).toBe(true);
    expect(Object.getPrototypeOf(params)).toBe(Object.prototype);
  });
});

describe(createFormContext, () => {
  it("defaults to nothing bound and nothing submitted", () => {
    expect.hasAssertions();

    const context = createFormContext();

    expect(context.stash).toStrictEqual({});
    expect(context.params).toStrictEqual({});
    expect(context.rules).toBeInstanceOf(RuleAdapter);
  });

  it("converts URLSearchParams input", () => {
    expect.hasAssertions();

    const context = createFormContext({
      params: new URLSearchParams([
        ["roles", "admin"],
        ["roles", "user"],
      ]),
    });

    expect(context.params).toStrictEqual({ roles: ["admin", "user"] });
  });
});
