import type { Arithmetic } from "./arithmetic.js";
import { ConstraintViolationError } from "./errors.js";
import type { NodeStore } from "./store.js";
import type { CircuitReport, CircuitViolation } from "./types.js";

/**
 * Recomputes every computed node from the current outputs of its inputs and
 * compares the result with the stored output. All mismatches are collected;
 * unset outputs and overflow still throw since they are not relation
 * failures.
 */
export function evaluateConstraints(store: NodeStore, arithmetic: Arithmetic): CircuitReport {
  const violations: CircuitViolation[] = [];

  for (let index = 0; index < store.size; index += 1) {
    const node = store.get(index);
    if (node.kind !== "computed") {
      continue;
    }
    const [leftIndex, rightIndex] = node.inputs;
    const left = store.readOutput(leftIndex, index);
    const right = store.readOutput(rightIndex, index);
    const actual = store.readOutput(index);
    const expected = arithmetic.apply(node.operation, left, right, index);
    if (expected !== actual) {
      violations.push({
        node: index,
        message: `node #${index} ${node.operation}(#${leftIndex}, #${rightIndex}) holds ${actual}, expected ${expected}`,
        expected,
        actual,
        details: { operation: node.operation, inputs: [leftIndex, rightIndex], operands: [String(left), String(right)] },
      });
    }
  }

  return violations.length === 0 ? { ok: true } : { ok: false, violations };
}

/** Assert that every computed relation holds, throwing a {@link ConstraintViolationError} when one does not. */
export function assertConstraints(store: NodeStore, arithmetic: Arithmetic): void {
  const report = evaluateConstraints(store, arithmetic);
  if (!report.ok) {
    throw new ConstraintViolationError(report.violations);
  }
}
