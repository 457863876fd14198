import { expect } from "chai";
import {
  PheromoneTable,
  PheromoneTableView,
  createEdgeKey,
} from "../../../src/colony/PheromoneTable";

describe("PheromoneTable", () => {
  describe("createEdgeKey()", () => {
    it("should create the same key in either direction", () => {
      expect(createEdgeKey(3, 7)).to.equal("3|7");
      expect(createEdgeKey(7, 3)).to.equal("3|7");
    });

    it("should not confuse multi-digit indices", () => {
      expect(createEdgeKey(1, 23)).to.not.equal(createEdgeKey(12, 3));
    });
  });

  describe("touch()", () => {
    it("should create edges with zero pheromone in both slots", () => {
      const table = new PheromoneTable();
      const edge = table.touch(5, 2);

      expect(edge.a).to.equal(2);
      expect(edge.b).to.equal(5);
      expect(edge.levels).to.deep.equal([0, 0]);
      expect(table.size).to.equal(1);
    });

    it("should address the same record for (a, b) and (b, a)", () => {
      const table = new PheromoneTable();
      const forward = table.touch(4, 9);
      const backward = table.touch(9, 4);

      expect(backward).to.equal(forward);
      expect(table.size).to.equal(1);
    });
  });

  describe("get() and level()", () => {
    it("should read without creating", () => {
      const table = new PheromoneTable();

      expect(table.get(0, 1)).to.be.undefined;
      expect(table.level(0, 1, 0)).to.equal(0);
      expect(table.size).to.equal(0);
    });
  });

  describe("deposit()", () => {
    it("should accumulate into one slot only", () => {
      const table = new PheromoneTable();
      table.deposit(0, 1, 0, 2.5);
      table.deposit(1, 0, 0, 1.5);

      expect(table.level(0, 1, 0)).to.equal(4);
      expect(table.level(0, 1, 1)).to.equal(0);
    });
  });

  describe("carryForward()", () => {
    it("should copy slot 0 into slot 1 for every edge", () => {
      const table = new PheromoneTable();
      table.deposit(0, 1, 0, 3);
      table.deposit(1, 2, 0, 7);

      table.carryForward(1);

      expect(table.get(0, 1)?.levels).to.deep.equal([3, 3]);
      expect(table.get(1, 2)?.levels).to.deep.equal([7, 7]);
    });

    it("should copy slot 1 into slot 0", () => {
      const table = new PheromoneTable();
      table.deposit(0, 1, 0, 3);
      table.deposit(0, 1, 1, 8);

      table.carryForward(0);

      expect(table.get(0, 1)?.levels).to.deep.equal([8, 8]);
    });
  });

  describe("strongest()", () => {
    it("should rank edges by pheromone, keeping discovery order on ties", () => {
      const table = new PheromoneTable();
      table.deposit(0, 1, 0, 2);
      table.deposit(1, 2, 0, 5);
      table.deposit(2, 3, 0, 2);
      table.touch(3, 4);

      const ranked = table.strongest(0, 3).map(edge => [edge.a, edge.b]);

      expect(ranked).to.deep.equal([[1, 2], [0, 1], [2, 3]]);
    });
  });

  describe("PheromoneTableView", () => {
    it("should mirror the table without exposing its edges", () => {
      const table = new PheromoneTable();
      const view = new PheromoneTableView(table);
      table.deposit(2, 1, 1, 6);

      const edge = view.get(1, 2);

      expect(view.size).to.equal(1);
      expect(view.level(1, 2, 1)).to.equal(6);
      expect(edge).to.deep.equal({ a: 1, b: 2, levels: [0, 6] });
      expect(edge).to.not.equal(table.get(1, 2));
      expect(view.get(3, 4)).to.be.undefined;
      expect(table.size).to.equal(1);
    });

    it("should return copies taken at the time of the call", () => {
      const table = new PheromoneTable();
      const view = new PheromoneTableView(table);
      table.deposit(0, 1, 0, 1);
      const before = view.get(0, 1);

      table.deposit(0, 1, 0, 1);

      expect(before?.levels).to.deep.equal([1, 0]);
      expect(view.get(0, 1)?.levels).to.deep.equal([2, 0]);
    });
  });
});
