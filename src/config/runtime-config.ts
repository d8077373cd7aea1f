// =============================================================================
// RuntimeConfig — Decoder & dispatch settings, loaded from JSON + environment
// =============================================================================

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";

import { ValidationError } from "../errors.js";
import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";

export const LOG_LEVEL_ENV = "STREAMSHAPE_LOG_LEVEL";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const DecoderOptionsSchema = z
  .object({
    caseInsensitiveEnums: z.boolean().describe("Try case-insensitive enum matching after exact name/alias"),
    enumSubstringFallback: z.boolean().describe("Accept a unique enum name/alias found inside free text"),
    singleValueAsList: z.boolean().describe("Wrap a lone value as a one-element list"),
    verifyConvergence: z.boolean().describe("Check partial/final values with the convergence tracker"),
  })
  .partial()
  .strict();

export const RuntimeConfigSchema = z
  .object({
    logLevel: LogLevelSchema,
    defaultVersion: z.enum(["first", "last"]).describe("Version picked when a call names none"),
    decoder: DecoderOptionsSchema,
  })
  .partial()
  .strict();

export interface DecoderOptions {
  caseInsensitiveEnums: boolean;
  enumSubstringFallback: boolean;
  singleValueAsList: boolean;
  verifyConvergence: boolean;
}

export interface RuntimeConfig {
  logLevel: LogLevel;
  defaultVersion: "first" | "last";
  decoder: DecoderOptions;
}

export type RuntimeConfigInput = z.infer<typeof RuntimeConfigSchema>;

export const DEFAULT_DECODER_OPTIONS: Readonly<DecoderOptions> = Object.freeze({
  caseInsensitiveEnums: true,
  enumSubstringFallback: true,
  singleValueAsList: true,
  verifyConvergence: true,
});

export const DEFAULT_RUNTIME_CONFIG: Readonly<RuntimeConfig> = Object.freeze({
  logLevel: "warn",
  defaultVersion: "first",
  decoder: DEFAULT_DECODER_OPTIONS,
});

/** Validate a raw object and fill every missing setting with its default. */
export function resolveRuntimeConfig(input: unknown = {}): RuntimeConfig {
  const result = RuntimeConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
    throw new ValidationError(issue?.message ?? "Invalid configuration", field);
  }
  const parsed = result.data;
  const decoder = parsed.decoder ?? {};
  return {
    logLevel: parsed.logLevel ?? DEFAULT_RUNTIME_CONFIG.logLevel,
    defaultVersion: parsed.defaultVersion ?? DEFAULT_RUNTIME_CONFIG.defaultVersion,
    decoder: {
      caseInsensitiveEnums: decoder.caseInsensitiveEnums ?? DEFAULT_DECODER_OPTIONS.caseInsensitiveEnums,
      enumSubstringFallback: decoder.enumSubstringFallback ?? DEFAULT_DECODER_OPTIONS.enumSubstringFallback,
      singleValueAsList: decoder.singleValueAsList ?? DEFAULT_DECODER_OPTIONS.singleValueAsList,
      verifyConvergence: decoder.verifyConvergence ?? DEFAULT_DECODER_OPTIONS.verifyConvergence,
    },
  };
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads a JSON config file (a missing file means defaults) and applies the
 * `STREAMSHAPE_LOG_LEVEL` override.
 */
export function loadRuntimeConfig(path?: string, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  let raw: unknown = {};
  if (path !== undefined && existsSync(path)) {
    const text = readFileSync(path, "utf-8");
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ValidationError(`Config file is not valid JSON (${err instanceof Error ? err.message : String(err)})`, path);
    }
  }

  const config = resolveRuntimeConfig(raw);

  const override = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (override) {
    if (!isLogLevel(override)) {
      throw new ValidationError(`expected one of ${LOG_LEVELS.join(", ")}, got "${override}"`, LOG_LEVEL_ENV);
    }
    config.logLevel = override;
  }
  return config;
}
