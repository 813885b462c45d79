import { describe, it } from "mocha";
import { expect } from "chai";

import { formatNode } from "../src/circuit/format.js";
import { buildSqrtHint, createCircuit } from "./helpers/circuit.js";

describe("circuit debug rendering", () => {
  it("renders every node variant on one line", () => {
    expect(formatNode({ kind: "input", id: 0 })).to.equal("#0 input = unset");
    expect(formatNode({ kind: "constant", id: 1, output: 7n })).to.equal("#1 const = 7");
    expect(formatNode({ kind: "computed", id: 2, operation: "add", inputs: [0, 1], output: 16n })).to.equal(
      "#2 add(#0, #1) = 16",
    );
    expect(formatNode({ kind: "hint", id: 3, link: 2, output: 4n })).to.equal("#3 hint -> #2 = 4");
  });

  it("renders the whole graph before and after a fill", () => {
    const circuit = createCircuit();
    const { x } = buildSqrtHint(circuit);

    expect(circuit.describe()).to.equal(
      [
        "circuit width=32 overflow=checked nodes=5",
        "  #0 input = unset",
        "  #1 const = 7",
        "  #2 add(#0, #1) = unset",
        "  #3 hint -> #2 = 4",
        "  #4 mul(#3, #3) = unset",
      ].join("\n"),
    );

    circuit.fillNodes(x, 9);

    expect(`${circuit}`).to.equal(
      [
        "circuit width=32 overflow=checked nodes=5",
        "  #0 input = 9",
        "  #1 const = 7",
        "  #2 add(#0, #1) = 16",
        "  #3 hint -> #2 = 4",
        "  #4 mul(#3, #3) = 16",
      ].join("\n"),
    );
  });

  it("reports the arithmetic settings in the header", () => {
    const circuit = createCircuit({ width: 8, overflow: "wrapping" });

    expect(circuit.describe()).to.equal("circuit width=8 overflow=wrapping nodes=0");
  });
});
