/**
 * Shared types used across the circuit modules. Grouping the error catalogue
 * here keeps codes consistent between the builder, the evaluator and the
 * checkers.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by failure family.
 * Structural misuse, constraint violations and arithmetic overflow each get
 * their own family so callers can branch on the prefix alone.
 */
export const ERROR_CATALOG = {
  STRUCT: {
    INDEX_RANGE: "E-STRUCT-INDEX-RANGE",
    FORWARD_REF: "E-STRUCT-FORWARD-REF",
    OUTPUT_UNSET: "E-STRUCT-OUTPUT-UNSET",
    NOT_INPUT: "E-STRUCT-NOT-INPUT",
    NOT_HINT: "E-STRUCT-NOT-HINT",
    VALUE_RANGE: "E-STRUCT-VALUE-RANGE",
  },
  CONSTRAINT: {
    MISMATCH: "E-CONSTRAINT-MISMATCH",
  },
  HINT: {
    MISMATCH: "E-HINT-MISMATCH",
  },
  ARITH: {
    OVERFLOW: "E-ARITH-OVERFLOW",
  },
  CONFIG: {
    INVALID: "E-CONFIG-INVALID",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `STRUCT_OUTPUT_UNSET`).
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const families: Record<string, Record<string, string>> = catalog;
  const flat: Record<string, string> = {};
  for (const [familyKey, family] of Object.entries(families)) {
    for (const [codeKey, code] of Object.entries(family)) {
      flat[`${familyKey}_${codeKey}`] = code;
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.HINT_MISMATCH`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the circuit. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Error families a caller may branch on without matching individual codes. */
export type ErrorFamily = "structure" | "constraint" | "overflow" | "config";

/** Maps a stable code back to its family. */
export function errorFamilyOf(code: ErrorCode): ErrorFamily {
  if (code.startsWith("E-STRUCT-")) {
    return "structure";
  }
  if (code.startsWith("E-ARITH-")) {
    return "overflow";
  }
  if (code.startsWith("E-CONFIG-")) {
    return "config";
  }
  return "constraint";
}
