/**
 * Helpers reading environment variables in a predictable manner. Values are
 * trimmed and blank strings count as unset; interpretation and validation
 * are left to the zod schema consuming them so invalid literals surface as
 * configuration errors instead of silently falling back to defaults.
 */

/** Environment record the readers consult, `process.env` unless overridden. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Normalises the raw value retrieved from the environment. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns the trimmed value of {@link name}, or `undefined` when unset or blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads {@link name} as a base-10 integer. Non-numeric literals are returned
 * as `NaN` rather than dropped so the schema can report them.
 */
export function readOptionalInteger(name: string, env: EnvSource = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (normalised === undefined) {
    return undefined;
  }
  return /^[-+]?\d+$/.test(normalised) ? Number.parseInt(normalised, 10) : Number.NaN;
}

/** Reads {@link name} lower-cased, for enum-like settings compared case-insensitively. */
export function readOptionalLowercase(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name])?.toLowerCase();
}
