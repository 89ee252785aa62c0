import { describe, it, expect } from "vitest";
import { MissingFieldNameError } from "@lib/errors";
import {
  fieldId,
  fieldName,
  isIndexToken,
  joinPath,
  labelText,
  parsePath,
} from "@lib/path";

describe(parsePath, () => {
  it("splits a dotted name into tokens", () => {
    expect.hasAssertions();

    expect(parsePath("user.addresses.0.street")).toStrictEqual([
      "user",
      "addresses",
      "0",
      "street",
    ]);
    expect(parsePath("q")).toStrictEqual(["q"]);
  });

  it("rejects a missing or empty name", () => {
    expect.hasAssertions();

    expect(() => parsePath(undefined)).toThrow(MissingFieldNameError);
    expect(() => parsePath("")).toThrow("Field name required: no name given");
  });

  it("rejects empty segments", () => {
    expect.hasAssertions();

    expect(() => parsePath("user..name")).toThrow(MissingFieldNameError);
    expect(() => parsePath(".name")).toThrow(MissingFieldNameError);
    expect(() => parsePath("user.")).toThrow(
      "Field name required: 'user.' contains an empty segment",
    );
  });
});

describe(joinPath, () => {
  it("appends a relative, possibly dotted, name to a prefix", () => {
    expect.hasAssertions();

    expect(joinPath(["user"], "address.city")).toStrictEqual([
      "user",
      "address",
      "city",
    ]);
  });
});

describe("names and ids", () => {
  it("joins tokens with dots for the name and dashes for the id", () => {
    expect.hasAssertions();

    const path = parsePath("user.orders.1.id");

    expect(fieldName(path)).toBe("user.orders.1.id");
    expect(fieldId(path)).toBe("user-orders-1-id");
  });
});

describe(isIndexToken, () => {
  it("accepts non-negative integers without leading zeros", () => {
    expect.hasAssertions();

    expect(isIndexToken("0")).toBe(true);
    expect(isIndexToken("12")).toBe(true);
    expect(isIndexToken("01")).toBe(false);
    expect(isIndexToken("-1")).toBe(false);
    expect(isIndexToken("1.5")).toBe(false);
    expect(isIndexToken("name")).toBe(false);
  });
});

describe(labelText, () => {
  it("humanizes the last non-index token", () => {
    expect.hasAssertions();

    expect(labelText(parsePath("user.first_name"))).toBe("First name");
    expect(labelText(parsePath("user.phones.0"))).toBe("Phones");
    expect(labelText(parsePath("email"))).toBe("Email");
  });
});
