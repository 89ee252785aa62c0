import { z } from "zod";

export const logLevels = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = (typeof logLevels)[number];

export const formBindEnvSchema = z.object({
  FORMBIND_LOG_LEVEL: z
    .enum(logLevels)
    // Keep test output clean unless a level is asked for explicitly
    .default(process.env.NODE_ENV === "test" ? "silent" : "info"),
  FORMBIND_SERVICE_NAME: z.string().trim().min(1).default("formbind"),
  NODE_ENV: z.string().trim().min(1).default("development"),
});

export type FormBindEnv = z.infer<typeof formBindEnvSchema>;

/**
 * Validates the environment variables formbind reads.
 * @throws Error listing every invalid variable
 */
export function validateFormBindEnv(
  env: NodeJS.ProcessEnv = process.env,
): FormBindEnv {
  const result = formBindEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = formatEnvIssues(result.error.issues)
      .map((issue) => `  - ${issue}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

export function formatEnvIssues(
  issues: readonly { path: readonly PropertyKey[]; message: string }[],
): string[] {
  return issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`);
}
