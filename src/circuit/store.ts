import { ERROR_CODES } from "../types.js";
import { CircuitStructureError, indexOutOfRange, outputUnset } from "./errors.js";
import type { CircuitNode, CircuitValue, NodeIndex } from "./types.js";

/**
 * Append-only arena holding every node of a circuit. Nodes are addressed by
 * their position; lookups are bounds-checked and only `output` fields of
 * input and computed nodes ever change after construction.
 */
export class NodeStore {
  private readonly nodes: CircuitNode[];

  constructor(nodes: readonly CircuitNode[] = []) {
    this.nodes = nodes.map((node) => copyNode(node));
  }

  get size(): number {
    return this.nodes.length;
  }

  /** Appends the node produced by {@link create} and returns its index. */
  append(create: (id: NodeIndex) => CircuitNode): NodeIndex {
    const id = this.nodes.length;
    this.nodes.push(create(id));
    return id;
  }

  /** Live record at {@link index}. Callers inside the circuit modules only. */
  get(index: NodeIndex): CircuitNode {
    if (!Number.isInteger(index) || index < 0 || index >= this.nodes.length) {
      throw indexOutOfRange(index, this.nodes.length);
    }
    const node = this.nodes[index];
    if (node === undefined) {
      throw indexOutOfRange(index, this.nodes.length);
    }
    return node;
  }

  /** Detached copy of the record at {@link index}. */
  snapshot(index: NodeIndex): CircuitNode {
    return copyNode(this.get(index));
  }

  list(): CircuitNode[] {
    return this.nodes.map((node) => copyNode(node));
  }

  /**
   * Ensures {@link index} names a node created before the one about to be
   * appended. Anything at or beyond the current size would be a forward
   * reference and would break index-order evaluation.
   */
  requireEarlier(index: NodeIndex, role: string): void {
    if (Number.isInteger(index) && index >= this.nodes.length) {
      throw new CircuitStructureError(
        ERROR_CODES.STRUCT_FORWARD_REF,
        `${role} references node #${index} which does not exist yet (next index is ${this.nodes.length})`,
        { index, next: this.nodes.length, role },
      );
    }
    this.get(index);
  }

  /** Output of {@link index}; an unset output is a structural error. */
  readOutput(index: NodeIndex, readBy?: NodeIndex): CircuitValue {
    const output = this.get(index).output;
    if (output === undefined) {
      throw outputUnset(index, readBy);
    }
    return output;
  }

  /** Current outputs indexed by node position, `undefined` where unset. */
  outputs(): Array<CircuitValue | undefined> {
    return this.nodes.map((node) => node.output);
  }

  /**
   * Overwrites the output of an input or computed node. Constants and hints
   * are fixed at construction and cannot be written.
   */
  setOutput(index: NodeIndex, value: CircuitValue): void {
    const node = this.get(index);
    if (node.kind === "constant" || node.kind === "hint") {
      throw new CircuitStructureError(
        ERROR_CODES.STRUCT_NOT_INPUT,
        `node #${index} is a ${node.kind} node; its output is fixed at construction`,
        { index, kind: node.kind },
      );
    }
    node.output = value;
  }

  /** Writes back a full output vector produced by the evaluator. */
  commit(outputs: ReadonlyArray<CircuitValue | undefined>): void {
    this.nodes.forEach((node, index) => {
      const value = outputs[index];
      if ((node.kind === "input" || node.kind === "computed") && value !== undefined) {
        node.output = value;
      }
    });
  }

  clone(): NodeStore {
    return new NodeStore(this.nodes);
  }
}

function copyNode(node: CircuitNode): CircuitNode {
  switch (node.kind) {
    case "computed":
      return { ...node, inputs: [node.inputs[0], node.inputs[1]] };
    default:
      return { ...node };
  }
}
