#!/usr/bin/env node
/**
 * Walks through the square-root hint circuit: prints the graph before and
 * after filling, inspects one node, then runs both validation steps.
 *
 * Usage: node --import tsx scripts/demo.ts [x]
 */
import process from "node:process";
import { fileURLToPath } from "node:url";

import { CircuitBuilder } from "../src/circuit/builder.js";
import { formatNode } from "../src/circuit/format.js";
import { StructuredLogger } from "../src/logger.js";

export interface DemoResult {
  constraintsHold: boolean;
  hintHolds: boolean;
}

/**
 * Builds `x + 7` with a hint of 4 claimed to be its square root, fills it
 * with {@link x} and reports both checks. Failures are reported, not thrown.
 */
export function runDemo(x: number, print: (line: string) => void, logger?: StructuredLogger): DemoResult {
  const circuit = new CircuitBuilder(logger ? { logger } : {});
  const input = circuit.init();
  const seven = circuit.constant(7);
  const sum = circuit.add(input, seven);
  const root = circuit.hint(4, sum);
  const square = circuit.multiply(root, root);

  print("before fill:");
  print(circuit.describe());
  circuit.fillNodes(input, x);
  print(`after fill (x = ${x}):`);
  print(circuit.describe());
  print(`inspect: ${formatNode(circuit.getNode(sum))}`);

  const constraintsHold = circuit.evaluateConstraints().ok;
  print(`constraints hold: ${constraintsHold}`);
  const hint = circuit.evaluateHint(root, square);
  print(hint.ok ? "hint equality holds: true" : `hint equality holds: false (${hint.violations[0]?.message ?? "mismatch"})`);
  return { constraintsHold, hintHolds: hint.ok };
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const raw = process.argv[2] ?? "9";
  const x = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(x) || x < 0) {
    process.stderr.write(`expected a non-negative integer, received '${raw}'\n`);
    process.exit(1);
  }
  const logger = new StructuredLogger({ level: "debug", sink: (line) => void process.stderr.write(line) });
  const result = runDemo(x, (line) => void process.stdout.write(`${line}\n`), logger);
  process.exitCode = result.constraintsHold && result.hintHolds ? 0 : 2;
}
