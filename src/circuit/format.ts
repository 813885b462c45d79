import type { Arithmetic } from "./arithmetic.js";
import type { CircuitNode, CircuitValue } from "./types.js";

function formatValue(value: CircuitValue | undefined): string {
  return value === undefined ? "unset" : value.toString();
}

/** Single-line debug rendering of a node, e.g. `#3 mul(#0, #0) = 36`. */
export function formatNode(node: CircuitNode): string {
  switch (node.kind) {
    case "input":
      return `#${node.id} input = ${formatValue(node.output)}`;
    case "constant":
      return `#${node.id} const = ${formatValue(node.output)}`;
    case "computed":
      return `#${node.id} ${node.operation}(#${node.inputs[0]}, #${node.inputs[1]}) = ${formatValue(node.output)}`;
    case "hint":
      return `#${node.id} hint -> #${node.link} = ${formatValue(node.output)}`;
  }
}

/** Multi-line rendering: a header with the arithmetic settings, then one indented line per node. */
export function formatGraph(
  nodes: readonly CircuitNode[],
  arithmetic: Pick<Arithmetic, "width" | "overflow">,
): string {
  const lines = [`circuit width=${arithmetic.width} overflow=${arithmetic.overflow} nodes=${nodes.length}`];
  for (const node of nodes) {
    lines.push(`  ${formatNode(node)}`);
  }
  return lines.join("\n");
}
