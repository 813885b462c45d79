import { resolveCircuitOptions, type CircuitOptions, type CircuitOptionsInput } from "../config/circuitOptions.js";
import { StructuredLogger } from "../logger.js";
import { createArithmetic, type Arithmetic } from "./arithmetic.js";
import { assertConstraints, evaluateConstraints } from "./constraints.js";
import { ConstraintViolationError } from "./errors.js";
import { fillNodes, type FillSummary } from "./evaluator.js";
import { formatGraph } from "./format.js";
import { assertHintEquality, evaluateHintEquality } from "./hints.js";
import { NodeStore } from "./store.js";
import type { CircuitNode, CircuitReport, CircuitValue, NodeIndex, Operation, ValueLike } from "./types.js";

export interface CircuitBuilderOptions extends CircuitOptionsInput {
  /** Logger receiving fill and validation events. Built from the resolved options when omitted. */
  logger?: StructuredLogger;
}

/**
 * Builds an arithmetic circuit with hint nodes, fills it for concrete inputs
 * and validates the result.
 *
 * Every construction call appends one node and returns its index. Indices
 * passed back in must name nodes that already exist, which makes
 * construction order a valid evaluation order.
 *
 * ```ts
 * const circuit = new CircuitBuilder();
 * const x = circuit.init();
 * const square = circuit.multiply(x, x);
 * circuit.fillNodes(x, 6);
 * circuit.getNode(square).output; // 36n
 * ```
 */
export class CircuitBuilder {
  readonly options: CircuitOptions;
  private readonly arithmetic: Arithmetic;
  private readonly logger: StructuredLogger;
  private store: NodeStore;

  constructor(options: CircuitBuilderOptions = {}) {
    const { logger, ...overrides } = options;
    this.options = resolveCircuitOptions(overrides);
    this.arithmetic = createArithmetic(this.options.width, this.options.overflow);
    this.logger =
      logger ?? new StructuredLogger({ level: this.options.logLevel, logFile: this.options.logFile ?? null });
    this.store = new NodeStore();
  }

  /** Number of nodes created so far; also the index the next node receives. */
  get size(): number {
    return this.store.size;
  }

  /** Appends an input node, filled later through {@link fillNodes}. */
  init(): NodeIndex {
    return this.store.append((id) => ({ kind: "input", id }));
  }

  /** Appends a node whose output is fixed to {@link value}. */
  constant(value: ValueLike): NodeIndex {
    const output = this.arithmetic.normalise(value, `constant #${this.store.size}`);
    return this.store.append((id) => ({ kind: "constant", id, output }));
  }

  add(a: NodeIndex, b: NodeIndex): NodeIndex {
    return this.computed("add", a, b);
  }

  multiply(a: NodeIndex, b: NodeIndex): NodeIndex {
    return this.computed("mul", a, b);
  }

  /** Shorthand for {@link multiply}. */
  mul(a: NodeIndex, b: NodeIndex): NodeIndex {
    return this.multiply(a, b);
  }

  /**
   * Appends a hint node carrying an externally computed {@link value} and
   * linked to {@link dependent}. Nothing about the relation is checked here;
   * {@link assertEqual} does that once the circuit is filled.
   */
  hint(value: ValueLike, dependent: NodeIndex): NodeIndex {
    this.store.requireEarlier(dependent, `hint #${this.store.size}`);
    const output = this.arithmetic.normalise(value, `hint #${this.store.size}`);
    return this.store.append((id) => ({ kind: "hint", id, link: dependent, output }));
  }

  /** Copy of the node at {@link index}. */
  getNode(index: NodeIndex): CircuitNode {
    return this.store.snapshot(index);
  }

  listNodes(): CircuitNode[] {
    return this.store.list();
  }

  /** Fills a single input node and propagates its value through the circuit. */
  fillNodes(input: NodeIndex, value: ValueLike): FillSummary {
    return this.fill(new Map([[input, value]]));
  }

  /**
   * Fills several input nodes at once. Either every computed node is
   * updated or, on failure, none is.
   */
  fill(assignments: Iterable<readonly [NodeIndex, ValueLike]>): FillSummary {
    const normalised = new Map<NodeIndex, CircuitValue>();
    for (const [index, value] of assignments) {
      normalised.set(index, this.arithmetic.normalise(value, `input #${index}`));
    }
    const summary = fillNodes(this.store, normalised, this.arithmetic);
    this.logger.debug("circuit_filled", {
      assigned: summary.assigned,
      values: summary.assigned.map((index) => normalised.get(index)),
      computed: summary.computed,
      nodes: this.store.size,
    });
    return summary;
  }

  /** Non-throwing form of {@link checkConstraints}. */
  evaluateConstraints(): CircuitReport {
    return evaluateConstraints(this.store, this.arithmetic);
  }

  /**
   * Re-verifies every computed node against its inputs. Returns `true` or
   * throws a {@link ConstraintViolationError} listing each mismatch.
   */
  checkConstraints(): true {
    try {
      assertConstraints(this.store, this.arithmetic);
    } catch (error) {
      if (error instanceof ConstraintViolationError) {
        this.logger.warn("circuit_constraint_violation", {
          nodes: error.violations.map((violation) => violation.node),
          violations: error.violations.map((violation) => violation.message),
        });
      }
      throw error;
    }
    this.logger.debug("circuit_constraints_checked", { nodes: this.store.size });
    return true;
  }

  /** Non-throwing form of {@link assertEqual}. */
  evaluateHint(hint: NodeIndex, target: NodeIndex): CircuitReport {
    return evaluateHintEquality(this.store, hint, target);
  }

  /**
   * Asserts that the node linked from {@link hint} and {@link target} hold
   * the same output. Both must already be filled.
   */
  assertEqual(hint: NodeIndex, target: NodeIndex): true {
    try {
      assertHintEquality(this.store, hint, target);
    } catch (error) {
      if (error instanceof ConstraintViolationError) {
        const [violation] = error.violations;
        this.logger.warn("circuit_hint_mismatch", {
          hint,
          target,
          expected: violation?.expected,
          actual: violation?.actual,
        });
      }
      throw error;
    }
    return true;
  }

  /**
   * Independent copy sharing options and logger but not the node store, so
   * the same circuit can be filled with different inputs side by side.
   */
  clone(): CircuitBuilder {
    const copy = new CircuitBuilder({ ...this.options, logger: this.logger });
    copy.store = this.store.clone();
    return copy;
  }

  describe(): string {
    return formatGraph(this.store.list(), this.arithmetic);
  }

  toString(): string {
    return this.describe();
  }

  private computed(operation: Operation, a: NodeIndex, b: NodeIndex): NodeIndex {
    const role = `${operation} #${this.store.size}`;
    this.store.requireEarlier(a, role);
    this.store.requireEarlier(b, role);
    return this.store.append((id) => ({ kind: "computed", id, operation, inputs: [a, b] }));
  }
}
