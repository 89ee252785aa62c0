import { describe, it, expect } from "vitest";
import { validateFormBindEnv } from "@lib/env.schema";

describe(validateFormBindEnv, () => {
  it("accepts any deployment name in NODE_ENV", () => {
    expect.hasAssertions();

    const env = validateFormBindEnv({ NODE_ENV: "staging" });

    expect(env.NODE_ENV).toBe("staging");
    expect(env.FORMBIND_SERVICE_NAME).toBe("formbind");
  });

  it("fills in defaults for an empty environment", () => {
    expect.hasAssertions();

    expect(validateFormBindEnv({}).NODE_ENV).toBe("development");
  });

  it("reads an explicit log level", () => {
    expect.hasAssertions();

    expect(
      validateFormBindEnv({ FORMBIND_LOG_LEVEL: "debug" }).FORMBIND_LOG_LEVEL,
    ).toBe("debug");
  });

  it("lists every invalid variable", () => {
    expect.hasAssertions();

    expect(() =>
      validateFormBindEnv({ FORMBIND_LOG_LEVEL: "loud", FORMBIND_SERVICE_NAME: " " }),
    ).toThrow(/^Environment validation failed:\n {2}- FORMBIND_LOG_LEVEL: .+\n {2}- FORMBIND_SERVICE_NAME: /);
  });
});
