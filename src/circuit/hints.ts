import { ERROR_CODES } from "../types.js";
import { CircuitStructureError, ConstraintViolationError } from "./errors.js";
import type { NodeStore } from "./store.js";
import type { CircuitReport, HintNode, NodeIndex } from "./types.js";

/** Resolves {@link index} as a hint node. */
export function requireHint(store: NodeStore, index: NodeIndex): HintNode {
  const node = store.get(index);
  if (node.kind !== "hint") {
    throw new CircuitStructureError(
      ERROR_CODES.STRUCT_NOT_HINT,
      `node #${index} is a ${node.kind} node, not a hint`,
      { index, kind: node.kind },
    );
  }
  return node;
}

/**
 * Compares the output of the node a hint is linked to with the output of
 * {@link target}. The hint value itself is expected to have been routed
 * through computed nodes ending at {@link target}.
 */
export function evaluateHintEquality(store: NodeStore, hintIndex: NodeIndex, target: NodeIndex): CircuitReport {
  const hint = requireHint(store, hintIndex);
  const expected = store.readOutput(hint.link);
  const actual = store.readOutput(target);
  if (expected === actual) {
    return { ok: true };
  }
  return {
    ok: false,
    violations: [
      {
        node: target,
        message: `hint #${hintIndex} links #${hint.link} = ${expected} but node #${target} = ${actual}`,
        expected,
        actual,
        details: { hint: hintIndex, link: hint.link, hintValue: String(hint.output) },
      },
    ],
  };
}

export function assertHintEquality(store: NodeStore, hintIndex: NodeIndex, target: NodeIndex): void {
  const report = evaluateHintEquality(store, hintIndex, target);
  if (!report.ok) {
    throw new ConstraintViolationError(report.violations, ERROR_CODES.HINT_MISMATCH);
  }
}
