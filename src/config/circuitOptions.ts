import { z } from "zod";

import { CircuitConfigError } from "../circuit/errors.js";
import { SUPPORTED_WIDTHS } from "../circuit/types.js";
import { LOG_LEVELS } from "../logger.js";
import { readOptionalInteger, readOptionalLowercase, readOptionalString, type EnvSource } from "./env.js";

/** Environment variables recognised by {@link resolveCircuitOptions}. */
export const CIRCUIT_ENV = {
  width: "HINT_CIRCUIT_WIDTH",
  overflow: "HINT_CIRCUIT_OVERFLOW",
  logLevel: "HINT_CIRCUIT_LOG_LEVEL",
  logFile: "HINT_CIRCUIT_LOG_FILE",
} as const;

const WidthSchema = z
  .number()
  .refine((value): value is (typeof SUPPORTED_WIDTHS)[number] => SUPPORTED_WIDTHS.some((width) => width === value), {
    message: `width must be one of ${SUPPORTED_WIDTHS.join(", ")}`,
  });

export const CircuitOptionsSchema = z
  .object({
    width: WidthSchema.default(32),
    overflow: z.enum(["checked", "wrapping"]).default("checked"),
    logLevel: z.enum(LOG_LEVELS).default("info"),
    logFile: z.string().min(1).optional(),
  })
  .strict();

/** Fully resolved options. */
export type CircuitOptions = z.output<typeof CircuitOptionsSchema>;

/** Options a caller may override; anything omitted comes from the environment or the defaults. */
export type CircuitOptionsInput = z.input<typeof CircuitOptionsSchema>;

function withoutUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

/** Reads the circuit settings present in {@link env}. */
export function readCircuitEnv(env: EnvSource = process.env): Record<string, unknown> {
  return withoutUndefined({
    width: readOptionalInteger(CIRCUIT_ENV.width, env),
    overflow: readOptionalLowercase(CIRCUIT_ENV.overflow, env),
    logLevel: readOptionalLowercase(CIRCUIT_ENV.logLevel, env),
    logFile: readOptionalString(CIRCUIT_ENV.logFile, env),
  });
}

/**
 * Merges explicit overrides over environment values over defaults and
 * validates the result. Every zod issue is reported in the thrown
 * {@link CircuitConfigError}.
 */
export function resolveCircuitOptions(
  overrides: CircuitOptionsInput = {},
  env: EnvSource = process.env,
): CircuitOptions {
  const merged = { ...readCircuitEnv(env), ...withoutUndefined(overrides) };
  const parsed = CircuitOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new CircuitConfigError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.length === 0 ? "(root)" : issue.path.join("."),
        message: issue.message,
      })),
    );
  }
  return parsed.data;
}
