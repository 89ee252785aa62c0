import { describe, it, expect } from "vitest";
import { createFormBind } from "@lib/create-form-bind";
import { InvalidConfigError, UnresolvedRootError } from "@lib/errors";
import { parseTag } from "../test/html";

describe(createFormBind, () => {
  it("installs valid and errors helpers by default", () => {
    expect.hasAssertions();

    const bind = createFormBind();
    const form = bind.forRequest({ params: { "user.name": "" } });
    form.field("user.name").required();

    expect(bind.methods).toStrictEqual({ valid: "valid", errors: "errors" });
    expect(form.valid()).toBe(false);
    expect(form.valid("user.name")).toBe(false);
    expect(form.errors()).toStrictEqual({ "user.name": "Required" });
    expect(form.errors("user.name")).toBe("Required");
    expect(form.errors("user.email")).toBeUndefined();
  });

  it("installs the helpers under the configured names", () => {
    expect.hasAssertions();

    const bind = createFormBind({
      methods: { valid: "isValid", errors: "fieldErrors" },
    });
    const form = bind.forRequest({ params: { email: "ada@example.com" } });
    form.field("email").required();

    expect(Object.keys(form).sort()).toStrictEqual([
      "context",
      "field",
      "fieldErrors",
      "fields",
      "isValid",
    ]);
    expect(form.isValid()).toBe(true);
    expect(form.fieldErrors()).toStrictEqual({});
  });

  it("keeps the default for a helper that is not renamed", () => {
    expect.hasAssertions();

    const form = createFormBind({ methods: { valid: "ok" } }).forRequest();

    expect(form.ok()).toBe(true);
    expect(form.errors()).toStrictEqual({});
  });

  it("rejects helper names that clash or are not identifiers", () => {
    expect.hasAssertions();

    expect(() => createFormBind({ methods: { valid: "field" } })).toThrow(
      InvalidConfigError,
    );
    expect(() => createFormBind({ methods: { valid: "same", errors: "same" } })).toThrow(
      "Invalid formbind configuration:\n  - methods: valid and errors helpers need different names",
    );
    expect(() => createFormBind({ methods: { errors: "not valid" } })).toThrow(
      "Invalid formbind configuration:\n  - methods.errors: must be a JavaScript identifier",
    );
  });

  it("uses configured messages for every request", () => {
    expect.hasAssertions();

    const bind = createFormBind({ messages: { required: "Please fill this in" } });
    const first = bind.forRequest({ params: { name: "" } });
    const second = bind.forRequest({ params: { name: "Ada" } });
    first.field("name").required();
    second.field("name").required();

    expect(first.errors("name")).toBe("Please fill this in");
    expect(second.valid()).toBe(true);
  });

  it("keeps each request's rules to itself", () => {
    expect.hasAssertions();

    const bind = createFormBind();
    const first = bind.forRequest({ params: { name: "" } });
    first.field("name").required();
    const second = bind.forRequest({ params: { name: "" } });

    expect(first.valid()).toBe(false);
    expect(second.valid()).toBe(true);
  });

  it("binds fields and scopes to the request's stash", () => {
    expect.hasAssertions();

    const form = createFormBind().forRequest({
      stash: { user: { name: "sshaw", tags: ["a", "b"] } },
    });

    expect(parseTag(form.field("user.name").text()).attributes.value).toBe("sshaw");
    expect(form.fields("user").field("name").value).toBe("sshaw");
    expect(() => form.field("order.id")).toThrow(UnresolvedRootError);
  });

  it("resolves against an explicit root when one is passed", () => {
    expect.hasAssertions();

    const form = createFormBind().forRequest({ stash: { user: { name: "stashed" } } });

    expect(form.field("user.name", { name: "given" }).value).toBe("given");
    expect(form.field("user.name", undefined).resolved).toBe(false);
    expect(form.fields("user", { name: "given" }).field("name").value).toBe("given");
  });
});
