import { describe, it } from "mocha";
import { expect } from "chai";

import { runDemo } from "../scripts/demo.js";
import { createSilentLogger } from "./helpers/circuit.js";

describe("demo script", () => {
  it("walks through a consistent square-root hint", () => {
    const lines: string[] = [];

    const result = runDemo(9, (line) => lines.push(line), createSilentLogger());

    expect(result).to.deep.equal({ constraintsHold: true, hintHolds: true });
    expect(lines[0]).to.equal("before fill:");
    expect(lines).to.include("after fill (x = 9):");
    expect(lines).to.include("inspect: #2 add(#0, #1) = 16");
    expect(lines.slice(-2)).to.deep.equal(["constraints hold: true", "hint equality holds: true"]);
  });

  it("reports an inconsistent hint without throwing", () => {
    const lines: string[] = [];

    const result = runDemo(10, (line) => lines.push(line), createSilentLogger());

    expect(result).to.deep.equal({ constraintsHold: true, hintHolds: false });
    expect(lines.at(-1)).to.equal("hint equality holds: false (hint #3 links #2 = 17 but node #4 = 16)");
  });
});
