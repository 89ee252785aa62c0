import { describe, expectTypeOf, it } from "vitest";
import { createFormBind } from "@lib/create-form-bind";
import type { Field } from "@lib/field";
import type { Scope } from "@lib/scope";

describe("helper names", () => {
  it("defaults to valid and errors", () => {
    const form = createFormBind().forRequest();

    expectTypeOf(form.field("user.name")).toEqualTypeOf<Field>();
    expectTypeOf(form.fields("user")).toEqualTypeOf<Scope>();
    expectTypeOf(form.valid()).toBeBoolean();
    expectTypeOf(form.errors()).toEqualTypeOf<Record<string, string>>();
    expectTypeOf(form.errors("user.name")).toEqualTypeOf<string | undefined>();
  });

  it("exposes renamed helpers under their literal names", () => {
    const bind = createFormBind({
      methods: { valid: "isValid", errors: "fieldErrors" },
    });
    const form = bind.forRequest();

    expectTypeOf(bind.methods).toEqualTypeOf<{
      valid: "isValid";
      errors: "fieldErrors";
    }>();
    expectTypeOf(form.isValid("user.name")).toBeBoolean();
    expectTypeOf(form.fieldErrors()).toEqualTypeOf<Record<string, string>>();
    expectTypeOf(form).not.toHaveProperty("valid");
    expectTypeOf(form).not.toHaveProperty("errors");
  });

  it("keeps the default for the helper left alone", () => {
    const form = createFormBind({ methods: { errors: "problems" } }).forRequest();

    expectTypeOf(form).toHaveProperty("valid");
    expectTypeOf(form).toHaveProperty("problems");
  });
});

describe("rule chaining", () => {
  it("returns the field or scope it was called on", () => {
    const form = createFormBind().forRequest({ stash: { user: {} } });

    expectTypeOf(form.field("user.name").required().minLength(2)).toEqualTypeOf<Field>();
    expectTypeOf(form.fields("user").required("name")).toEqualTypeOf<Scope>();
  });

  it("only accepts known message keys", () => {
    createFormBind({ messages: { required: "Needed" } });

    // @ts-expect-error unknown rule kind
    createFormBind({ messages: { between: "Out of range" } });
  });
});
