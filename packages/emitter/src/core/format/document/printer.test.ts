import { describe, it } from "mocha";
import { expect } from "chai";
import {
  blankLine,
  block,
  line,
  lines,
  printDocument,
  separated,
} from "./index.js";

describe("Document Printer", () => {
  it("should apply nested indent levels with the configured unit", () => {
    const units = [
      line("class A:"),
      block([line("x: int"), blankLine(), line("def f(self):"), block([line("pass")])]),
    ];

    expect(printDocument(units, "  ")).to.equal(
      "class A:\n  x: int\n\n  def f(self):\n    pass\n"
    );
  });

  it("should honour a line's own indent level inside a block", () => {
    const units = [block([line("a", 0), line("b", 1)], 1)];

    expect(printDocument(units, "\t")).to.equal("\ta\n\t\tb\n");
  });

  it("should end with exactly one newline", () => {
    expect(printDocument([line("x"), blankLine(), blankLine()], "    ")).to.equal(
      "x\n"
    );
    expect(printDocument([blankLine(), line("x")], "    ")).to.equal("x\n");
  });

  it("should not leave trailing whitespace", () => {
    expect(printDocument([block([line("")]), line("y  ")], "    ")).to.equal(
      "y\n"
    );
  });

  it("should reject lines containing line breaks", () => {
    expect(() => printDocument([line("a\nb")], "    ")).to.throw(
      /ICE: document line contains a line break/
    );
  });

  describe("separated", () => {
    it("should put one blank line between non-empty groups", () => {
      const units = separated([lines(["a", "b"]), [], lines(["c"])]);

      expect(printDocument(units, "    ")).to.equal("a\nb\n\nc\n");
    });
  });
});
