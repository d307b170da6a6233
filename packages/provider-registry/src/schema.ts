import { z } from "zod";
import type { ProviderSpec } from "./types.js";

/**
 * Input shape for a descriptor. Everything except the identity fields has a
 * default, so a minimal custom provider only names itself, its keywords and
 * its credential variable.
 */
export const ProviderSpecSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)).default([]),
  envKey: z.string().min(1),
  displayName: z.string().min(1).optional(),
  modelPrefix: z
    .string()
    .regex(/^[^/]*$/, "must not contain '/'")
    .default(""),
  skipPrefixes: z.array(z.string().min(1)).default([]),
  envExtras: z.array(z.tuple([z.string().min(1), z.string()])).default([]),
  isGateway: z.boolean().default(false),
  isLocal: z.boolean().default(false),
  detectByKeyPrefix: z.string().min(1).optional(),
  detectByBaseKeyword: z.string().min(1).optional(),
  defaultApiBase: z.string().url().optional(),
  stripModelPrefix: z.boolean().default(false),
  modelOverrides: z
    .array(z.tuple([z.string().min(1), z.record(z.unknown())]))
    .default([]),
  forceStream: z.boolean().default(false),
});

export type ProviderSpecInput = z.input<typeof ProviderSpecSchema>;

/** Thrown when a descriptor table fails validation. */
export class RegistryValidationError extends Error {
  /** The offending descriptor's name, or its position when unnamed. */
  readonly entry: string;

  constructor(message: string, entry: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "RegistryValidationError";
    this.entry = entry;
  }
}

/**
 * Validate a descriptor and fill in defaults.
 *
 * Keywords and override patterns are stored lower-case; the result is frozen.
 */
export function defineProvider(input: ProviderSpecInput | ProviderSpec): ProviderSpec {
  const result = ProviderSpecSchema.safeParse(input);
  if (!result.success) {
    const entry = input.name || "<unnamed>";
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new RegistryValidationError(
      `Invalid provider descriptor "${entry}": ${detail}`,
      entry,
      { cause: result.error },
    );
  }

  const spec = result.data;
  return Object.freeze({
    ...spec,
    displayName: spec.displayName ?? spec.name,
    keywords: Object.freeze(spec.keywords.map((k) => k.toLowerCase())),
    skipPrefixes: Object.freeze([...spec.skipPrefixes]),
    envExtras: Object.freeze(
      spec.envExtras.map(([envName, template]) => Object.freeze([envName, template] as const)),
    ),
    modelOverrides: Object.freeze(
      spec.modelOverrides.map(([pattern, overrides]) =>
        Object.freeze([pattern.toLowerCase(), Object.freeze({ ...overrides })] as const),
      ),
    ),
  });
}
