import { z } from "zod";
import { ConfigurationError } from "./types/index.js";

export const DEFAULT_MODEL = "anthropic/claude-opus-4-5";

// Logger configuration, read from the process environment. Unrecognized
// values fall back to the defaults instead of failing.
export const LoggerConfigSchema = z.object({
  LOG_LEVEL: z
    .string()
    .toLowerCase()
    .pipe(z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]))
    .catch("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).catch("production"),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function loadLoggerConfig(
  env: Record<string, string | undefined> = process.env,
): LoggerConfig {
  return parseOrThrow(LoggerConfigSchema, env, "Invalid logger configuration");
}

// Empty strings mean "not configured".
const blankAsAbsent = z
  .string()
  .optional()
  .transform((value) => value || undefined);

// Provider settings, passed to the RegistryProvider constructor
export const ProviderSettingsSchema = z.object({
  apiKey: blankAsAbsent,
  apiBase: blankAsAbsent.pipe(z.string().url().optional()),
  defaultModel: z.string().min(1).default(DEFAULT_MODEL),
  extraHeaders: z.record(z.string()).default({}),
  /** Configured provider key; the primary gateway detection signal. */
  providerName: z.string().min(1).optional(),
});

export type ProviderSettingsInput = z.input<typeof ProviderSettingsSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

export function parseProviderSettings(input: ProviderSettingsInput): ProviderSettings {
  return parseOrThrow(ProviderSettingsSchema, input, "Invalid provider settings");
}

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message: string,
): z.infer<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
  throw new ConfigurationError(`${message}: ${issues.join("; ")}`, {
    cause: result.error,
    issues,
  });
}
