import { z } from "zod";

import { ERROR_CODES } from "../types.js";
import { ArithmeticOverflowError, CircuitStructureError } from "./errors.js";
import type { BitWidth, CircuitValue, NodeIndex, Operation, OverflowPolicy, ValueLike } from "./types.js";

/** Literal accepted at the public boundary, before the width check. */
const ValueLikeSchema = z.union([
  z.bigint().nonnegative(),
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
]);

/**
 * Fixed-width unsigned arithmetic shared by the evaluator and the constraint
 * checker. Both must agree on the exact semantics, so they receive the same
 * instance from the builder.
 */
export interface Arithmetic {
  readonly width: BitWidth;
  readonly overflow: OverflowPolicy;
  /** Largest representable value (`2^width - 1`). */
  readonly max: CircuitValue;
  /** Applies {@link operation}; `node` only feeds the overflow diagnostics. */
  apply(operation: Operation, left: CircuitValue, right: CircuitValue, node: NodeIndex): CircuitValue;
  /** Validates a caller supplied literal and converts it to a circuit value. */
  normalise(value: ValueLike, context: string): CircuitValue;
}

export function createArithmetic(width: BitWidth, overflow: OverflowPolicy): Arithmetic {
  const modulus = 1n << BigInt(width);
  const max = modulus - 1n;

  return {
    width,
    overflow,
    max,
    apply(operation, left, right, node) {
      const raw = operation === "add" ? left + right : left * right;
      if (raw <= max) {
        return raw;
      }
      if (overflow === "wrapping") {
        return raw % modulus;
      }
      throw new ArithmeticOverflowError(node, operation, [left, right], width);
    },
    normalise(value, context) {
      const parsed = ValueLikeSchema.safeParse(value);
      if (!parsed.success) {
        throw new CircuitStructureError(
          ERROR_CODES.STRUCT_VALUE_RANGE,
          `${context}: ${String(value)} is not a non-negative integer`,
          { value: String(value), issues: parsed.error.issues.map((issue) => issue.message) },
        );
      }
      const candidate = BigInt(parsed.data);
      if (candidate > max) {
        throw new CircuitStructureError(
          ERROR_CODES.STRUCT_VALUE_RANGE,
          `${context}: ${candidate} does not fit in ${width} bits`,
          { value: candidate.toString(), width },
        );
      }
      return candidate;
    },
  };
}
