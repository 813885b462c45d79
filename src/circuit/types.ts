/**
 * Node model of an arithmetic circuit with hint nodes. Nodes live in an
 * append-only arena and are addressed by their position, so every reference
 * in this module is a plain integer handle.
 */

/** Position of a node inside the store. Doubles as the node identity. */
export type NodeIndex = number;

/** Concrete value carried by a node once filled. */
export type CircuitValue = bigint;

/** Values accepted at the public boundary before normalisation. */
export type ValueLike = number | bigint;

/** Binary operations supported by computed nodes. */
export type Operation = "add" | "mul";

/** Node whose value is supplied at fill time. */
export interface InputNode {
  readonly kind: "input";
  readonly id: NodeIndex;
  output?: CircuitValue;
}

/** Node whose value is fixed at construction time. */
export interface ConstantNode {
  readonly kind: "constant";
  readonly id: NodeIndex;
  readonly output: CircuitValue;
}

/** Node derived from two earlier nodes through {@link Operation}. */
export interface ComputedNode {
  readonly kind: "computed";
  readonly id: NodeIndex;
  readonly operation: Operation;
  readonly inputs: readonly [NodeIndex, NodeIndex];
  output?: CircuitValue;
}

/**
 * Externally supplied witness value. `link` names the node the hint claims a
 * relationship to; the relation itself is proven later through
 * {@link CircuitBuilder.assertEqual}.
 */
export interface HintNode {
  readonly kind: "hint";
  readonly id: NodeIndex;
  readonly link: NodeIndex;
  readonly output: CircuitValue;
}

export type CircuitNode = InputNode | ConstantNode | ComputedNode | HintNode;

/** Policy applied when a sum or product exceeds the configured width. */
export type OverflowPolicy = "checked" | "wrapping";

/** Bit widths the arithmetic layer supports. */
export const SUPPORTED_WIDTHS = [8, 16, 32, 64] as const;

export type BitWidth = (typeof SUPPORTED_WIDTHS)[number];

/** A single failed check collected by the constraint checker or a hint assertion. */
export interface CircuitViolation {
  /** Node whose relation does not hold (the computed node or the target node). */
  node: NodeIndex;
  /** Human readable explanation of the issue. */
  message: string;
  /** Value the relation requires. */
  expected: CircuitValue;
  /** Value currently stored. */
  actual: CircuitValue;
  /** Optional structured details attached to the violation. */
  details?: Record<string, unknown>;
}

/** Summary returned by the non-throwing check variants. */
export type CircuitReport =
  | { ok: true }
  | { ok: false; violations: CircuitViolation[] };
