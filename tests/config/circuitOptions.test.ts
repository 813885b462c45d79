import { describe, it } from "mocha";
import { expect } from "chai";

import { CircuitConfigError } from "../../src/circuit/errors.js";
import { readOptionalInteger, readOptionalLowercase, readOptionalString } from "../../src/config/env.js";
import { readCircuitEnv, resolveCircuitOptions } from "../../src/config/circuitOptions.js";
import { ERROR_CODES } from "../../src/types.js";

describe("circuit options", () => {
  it("falls back to 32-bit checked arithmetic", () => {
    expect(resolveCircuitOptions({}, {})).to.deep.equal({ width: 32, overflow: "checked", logLevel: "info" });
  });

  it("reads every setting from the environment", () => {
    const options = resolveCircuitOptions(
      {},
      {
        HINT_CIRCUIT_WIDTH: "16",
        HINT_CIRCUIT_OVERFLOW: "WRAPPING",
        HINT_CIRCUIT_LOG_LEVEL: " debug ",
        HINT_CIRCUIT_LOG_FILE: "/var/tmp/circuit.log",
      },
    );

    expect(options).to.deep.equal({
      width: 16,
      overflow: "wrapping",
      logLevel: "debug",
      logFile: "/var/tmp/circuit.log",
    });
  });

  it("lets explicit overrides win but ignores undefined ones", () => {
    const env = { HINT_CIRCUIT_WIDTH: "8", HINT_CIRCUIT_OVERFLOW: "wrapping" };

    expect(resolveCircuitOptions({ width: 64 }, env).width).to.equal(64);
    expect(resolveCircuitOptions({ width: undefined }, env).width).to.equal(8);
    expect(resolveCircuitOptions({ overflow: "checked" }, env).overflow).to.equal("checked");
  });

  it("treats blank variables as unset", () => {
    expect(readCircuitEnv({ HINT_CIRCUIT_WIDTH: "   ", HINT_CIRCUIT_LOG_FILE: "" })).to.deep.equal({});
  });

  it("reports every invalid setting", () => {
    expect(() =>
      resolveCircuitOptions({}, { HINT_CIRCUIT_WIDTH: "12", HINT_CIRCUIT_OVERFLOW: "saturating" }),
    )
      .to.throw(CircuitConfigError)
      .that.satisfies((error: unknown) => {
        expect(error).to.be.instanceOf(CircuitConfigError);
        if (error instanceof CircuitConfigError) {
          expect(error.code).to.equal(ERROR_CODES.CONFIG_INVALID);
          expect(error.issues.map((issue) => issue.path)).to.deep.equal(["width", "overflow"]);
          expect(error.issues[0]?.message).to.equal("width must be one of 8, 16, 32, 64");
        }
        return true;
      });
  });

  it("rejects a non-numeric width instead of defaulting", () => {
    expect(() => resolveCircuitOptions({}, { HINT_CIRCUIT_WIDTH: "wide" }))
      .to.throw(CircuitConfigError)
      .with.property("code", ERROR_CODES.CONFIG_INVALID);
  });
});

describe("environment readers", () => {
  it("parses integers and keeps malformed literals visible", () => {
    expect(readOptionalInteger("N", { N: "+12" })).to.equal(12);
    expect(readOptionalInteger("N", { N: "-3" })).to.equal(-3);
    expect(readOptionalInteger("N", { N: "1e3" })).to.be.NaN;
    expect(readOptionalInteger("N", {})).to.equal(undefined);
  });

  it("trims strings and lower-cases enum-like values", () => {
    expect(readOptionalString("S", { S: "  value " })).to.equal("value");
    expect(readOptionalString("S", { S: "\t" })).to.equal(undefined);
    expect(readOptionalLowercase("S", { S: " Checked" })).to.equal("checked");
  });
});
