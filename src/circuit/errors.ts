import { ERROR_CODES, errorFamilyOf, type ErrorCode, type ErrorFamily } from "../types.js";
import type { CircuitValue, CircuitViolation, NodeIndex, Operation } from "./types.js";

/** Base class of every error raised by the circuit modules. */
export class CircuitError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "CircuitError";
    this.code = code;
    this.details = details;
  }

  get family(): ErrorFamily {
    return errorFamilyOf(this.code);
  }
}

/**
 * Structural misuse: unknown indices, forward references, reads of unset
 * outputs, wrong node kinds and out-of-range literals.
 */
export class CircuitStructureError extends CircuitError {
  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = "CircuitStructureError";
  }
}

/** Raised when a computed relation or a hint assertion does not hold. */
export class ConstraintViolationError extends CircuitError {
  constructor(
    readonly violations: CircuitViolation[],
    code: ErrorCode = ERROR_CODES.CONSTRAINT_MISMATCH,
  ) {
    super(
      code,
      violations.map((violation) => `${code}: ${violation.message}`).join("; "),
      { violations },
    );
    this.name = "ConstraintViolationError";
  }
}

/** Raised under the `checked` overflow policy. */
export class ArithmeticOverflowError extends CircuitError {
  constructor(
    readonly node: NodeIndex,
    readonly operation: Operation,
    readonly operands: readonly [CircuitValue, CircuitValue],
    readonly width: number,
  ) {
    super(
      ERROR_CODES.ARITH_OVERFLOW,
      `node #${node}: ${operation}(${operands[0]}, ${operands[1]}) exceeds ${width}-bit range`,
      { node, operation, operands: operands.map(String), width },
    );
    this.name = "ArithmeticOverflowError";
  }
}

/** Raised when circuit options fail validation. */
export class CircuitConfigError extends CircuitError {
  constructor(readonly issues: Array<{ path: string; message: string }>) {
    super(
      ERROR_CODES.CONFIG_INVALID,
      issues.map((issue) => `${issue.path}: ${issue.message}`).join("; "),
      { issues },
    );
    this.name = "CircuitConfigError";
  }
}

export function indexOutOfRange(index: NodeIndex, size: number): CircuitStructureError {
  return new CircuitStructureError(
    ERROR_CODES.STRUCT_INDEX_RANGE,
    `node index ${index} is out of range (store holds ${size} nodes)`,
    { index, size },
  );
}

export function outputUnset(index: NodeIndex, readBy?: NodeIndex): CircuitStructureError {
  const reader = readBy === undefined ? "" : ` (read by node #${readBy})`;
  return new CircuitStructureError(
    ERROR_CODES.STRUCT_OUTPUT_UNSET,
    `node #${index} has no output yet${reader}`,
    readBy === undefined ? { index } : { index, readBy },
  );
}
