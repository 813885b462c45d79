import { ERROR_CODES } from "../types.js";
import type { Arithmetic } from "./arithmetic.js";
import { CircuitStructureError, outputUnset } from "./errors.js";
import type { NodeStore } from "./store.js";
import type { CircuitValue, NodeIndex } from "./types.js";

/** Outcome of a successful fill. */
export interface FillSummary {
  /** Input nodes written by this fill, in ascending order. */
  assigned: NodeIndex[];
  /** Number of computed nodes evaluated. */
  computed: number;
}

/**
 * Propagates concrete values through the store in index order.
 *
 * The assigned input nodes are set first, then every computed node receives
 * its operation applied to the outputs of its two inputs. Construction order
 * guarantees those inputs were visited earlier. Work happens on a staging
 * vector that is committed only once every node succeeded, so a failed fill
 * leaves the store as it was.
 */
export function fillNodes(
  store: NodeStore,
  assignments: ReadonlyMap<NodeIndex, CircuitValue>,
  arithmetic: Arithmetic,
): FillSummary {
  const staged = store.outputs();

  for (const [index, value] of assignments) {
    const node = store.get(index);
    if (node.kind !== "input") {
      throw new CircuitStructureError(
        ERROR_CODES.STRUCT_NOT_INPUT,
        `node #${index} is a ${node.kind} node and cannot be filled`,
        { index, kind: node.kind },
      );
    }
    staged[index] = value;
  }

  let computed = 0;
  for (let index = 0; index < store.size; index += 1) {
    const node = store.get(index);
    if (node.kind !== "computed") {
      continue;
    }
    const [leftIndex, rightIndex] = node.inputs;
    const left = staged[leftIndex];
    if (left === undefined) {
      throw outputUnset(leftIndex, index);
    }
    const right = staged[rightIndex];
    if (right === undefined) {
      throw outputUnset(rightIndex, index);
    }
    staged[index] = arithmetic.apply(node.operation, left, right, index);
    computed += 1;
  }

  store.commit(staged);
  return { assigned: [...assignments.keys()].sort((a, b) => a - b), computed };
}
