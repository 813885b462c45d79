import { CircuitBuilder, type CircuitBuilderOptions } from "../../src/circuit/builder.js";
import { StructuredLogger, type LoggerOptions } from "../../src/logger.js";

/** Logger that never writes to stdout, so mismatch warnings stay out of the reporter output. */
export function createSilentLogger(options: LoggerOptions = {}): StructuredLogger {
  return new StructuredLogger({ sink: null, ...options });
}

export function createCircuit(options: CircuitBuilderOptions = {}): CircuitBuilder {
  return new CircuitBuilder({ logger: createSilentLogger(), ...options });
}

/** `x*x + 5 + x`, node order: x, x*x, 5, x*x+5, y. */
export function buildPolynomial(circuit: CircuitBuilder): { x: number; y: number } {
  const x = circuit.init();
  const square = circuit.multiply(x, x);
  const five = circuit.constant(5);
  const shifted = circuit.add(square, five);
  const y = circuit.add(shifted, x);
  return { x, y };
}

/** `x + 7` with a hint of 4 claimed as its square root, node order: x, 7, s, h, h*h. */
export function buildSqrtHint(circuit: CircuitBuilder): { x: number; sum: number; root: number; square: number } {
  const x = circuit.init();
  const seven = circuit.constant(7);
  const sum = circuit.add(x, seven);
  const root = circuit.hint(4, sum);
  const square = circuit.multiply(root, root);
  return { x, sum, root, square };
}
