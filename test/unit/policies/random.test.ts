import { expect } from "chai";
import { mulberry32 } from "../../../src/policies/random";

describe("mulberry32()", () => {
  it("should repeat the sequence for the same seed", () => {
    const a = mulberry32(42);
    const b = mulberry32(42);

    for (let i = 0; i < 10; i++) {
      expect(a()).to.equal(b());
    }
  });

  it("should stay within [0, 1)", () => {
    const random = mulberry32(7);

    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).to.be.at.least(0);
      expect(value).to.be.below(1);
    }
  });

  it("should differ between seeds", () => {
    expect(mulberry32(1)()).to.not.equal(mulberry32(2)());
  });
});
