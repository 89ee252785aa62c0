import { describe, it, expect } from "vitest";
import { MissingFieldNameError, NotACollectionError } from "@lib/errors";
import { Field } from "@lib/field";
import { parsePath } from "@lib/path";
import { createFormContext, type FormContextInput } from "@lib/request-context";
import { Scope } from "@lib/scope";
import { parseTag } from "../test/html";

function scopeFor(path: string, input: FormContextInput = {}): Scope {
  return new Scope(createFormContext(input), parsePath(path));
}

const stash = {
  user: {
    name: "sshaw",
    admin: true,
    orders: [
      { id: 10, total: "5.00" },
      { id: 11, total: "7.50" },
    ],
    address: { city: "Berlin" },
  },
};

describe(Scope, () => {
  it("renders the same markup as a field with the joined name", () => {
    expect.hasAssertions();

    const context = createFormContext({ stash });
    const scope = new Scope(context, parsePath("user"));
    const field = new Field(context, parsePath("user.name"));

    expect(scope.text("name")).toBe(field.text());
    expect(scope.hidden("name", { class: "x" })).toBe(field.hidden({ class: "x" }));
    expect(scope.label("name")).toBe(field.label());
    expect(scope.checkbox("admin")).toBe(
      new Field(context, parsePath("user.admin")).checkbox(),
    );
    expect(parseTag(scope.checkbox("admin")).attributes.checked).toBe("");
  });

  it("accepts dotted names relative to its prefix", () => {
    expect.hasAssertions();

    expect(parseTag(scopeFor("user", { stash }).text("address.city")).attributes).toStrictEqual({
      type: "text",
      name: "user.address.city",
      id: "user-address-city",
      value: "Berlin",
    });
  });

  it("requires a field name for every operation", () => {
    expect.hasAssertions();

    const scope = scopeFor("user", { stash });

    expect(() => scope.text("")).toThrow(MissingFieldNameError);
    expect(() => scope.required("")).toThrow(
      "Field name required: 'user' needs a field name for this operation",
    );
  });

  it("yields one scope per element with its index and object", () => {
    expect.hasAssertions();

    const seen: [number | undefined, unknown, string][] = [];
    scopeFor("user.orders", { stash }).each((order, index) => {
      expect(order.index()).toBe(index);
      seen.push([order.index(), order.object(), order.name]);
    });

    expect(seen).toStrictEqual([
      [0, { id: 10, total: "5.00" }, "user.orders.0"],
      [1, { id: 11, total: "7.50" }, "user.orders.1"],
    ]);
  });

  it("renders element fields with indexed names", () => {
    expect.hasAssertions();

    const ids = [...scopeFor("user.orders", { stash })].map(
      (order) => parseTag(order.hidden("id")).attributes,
    );

    expect(ids).toStrictEqual([
      { type: "hidden", name: "user.orders.0.id", id: "user-orders-0-id", value: "10" },
      { type: "hidden", name: "user.orders.1.id", id: "user-orders-1-id", value: "11" },
    ]);
  });

  it("nests scopes", () => {
    expect.hasAssertions();

    const address = scopeFor("user", { stash }).fields("address");

    expect(address.name).toBe("user.address");
    expect(address.value).toStrictEqual({ city: "Berlin" });
    expect(address.object()).toStrictEqual({ city: "Berlin" });
    expect(address.index()).toBeUndefined();
  });

  it("iterates nothing when the collection is missing or null", () => {
    expect.hasAssertions();

    expect([...scopeFor("user.orders", { stash: { user: {} } })]).toStrictEqual([]);
    expect([...scopeFor("user.orders", { stash: { user: { orders: null } } })]).toStrictEqual([]);
  });

  it("refuses to iterate a value that is not an array", () => {
    expect.hasAssertions();

    const scope = scopeFor("user.orders", {
      stash: { user: { orders: new Map() } },
    });

    expect(() => [...scope]).toThrow(NotACollectionError);
    expect(() => {
      scope.each(() => undefined);
    }).toThrow("Cannot iterate 'user.orders': expected an array, got Map");
  });

  it("declares rules relative to its prefix and chains them", () => {
    expect.hasAssertions();

    const context = createFormContext({
      params: { "user.name": "", "user.email": "ada@example.com" },
    });
    const scope = new Scope(context, parsePath("user"))
      .required("name")
      .required("email")
      .matches("email", /@/);

    expect(scope.valid("name")).toBe(false);
    expect(scope.valid("email")).toBe(true);
    expect(scope.error("name")).toBe("Required");
    expect(context.rules.fieldNames()).toStrictEqual(["user.name", "user.email"]);
  });

  it("is valid as a whole when every field under its prefix is", () => {
    expect.hasAssertions();

    const context = createFormContext({
      params: { "user.email": "ada@example.com", "username": "" },
    });
    const user = new Scope(context, parsePath("user")).required("email");
    new Field(context, parsePath("username")).required();

    expect(user.valid()).toBe(true);
    expect(context.rules.isValid()).toBe(false);
  });
});
