/**
 * Environment configuration for the CLI.
 *
 * Parsed once at the boundary with zod; invalid values come back as data
 * rather than being thrown.
 */

import { z } from "zod";
import { isAlphabetName, type AlphabetName } from "./alphabets.js";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface BaseNConfig {
  readonly logLevel: LogLevel;
  /** Alphabet used when `--alphabet` is not given. */
  readonly defaultAlphabet: AlphabetName;
}

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

export type ConfigResult =
  | { readonly kind: "ok"; readonly config: BaseNConfig }
  | { readonly kind: "invalid"; readonly issues: readonly ConfigIssue[] };

const EnvSchema = z.object({
  BASE_N_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default("silent")),

  BASE_N_ALPHABET: z
    .string()
    .default("base64")
    .transform((v) => v.trim())
    .refine(isAlphabetName, { message: "Unknown alphabet name" }),
});

/**
 * Read configuration from an environment map such as `process.env`.
 */
export function loadConfig(env: Record<string, string | undefined>): ConfigResult {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return {
      kind: "invalid",
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    };
  }

  return {
    kind: "ok",
    config: {
      logLevel: parsed.data.BASE_N_LOG_LEVEL,
      defaultAlphabet: parsed.data.BASE_N_ALPHABET,
    },
  };
}
