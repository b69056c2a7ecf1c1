import { assert } from "chai";
import {
  getPostOrder,
  getReversePostOrder,
  StatementGraph,
} from "../../src/control-flow";
import { Stmt } from "../../src/ir";
import { call, goto, graphOf, ifGoto, local, method, nop, ret } from "./test-utils";

export function controlFlowTests() {
  describe("StatementGraph", () => {
    const i = local("i");
    const b = local("b");

    it("adds fall-through and branch edges", () => {
      const graph = graphOf(
        call(i, "hasNext", [], "head"),
        ifGoto(b, "end"),
        call(i, "next"),
        goto("head"),
        ret("end")
      );
      assert.deepEqual(graph.succsOf(0), [1]);
      assert.deepEqual(graph.succsOf(1), [2, 4]);
      assert.deepEqual(graph.succsOf(2), [3]);
      assert.deepEqual(graph.succsOf(3), [0]);
      assert.deepEqual(graph.succsOf(4), []);
      assert.deepEqual(graph.predsOf(0), [3]);
      assert.deepEqual(graph.predsOf(4), [1]);
      assert.deepEqual(graph.heads, [0]);
      assert.deepEqual(graph.tails, [4]);
    });

    it("treats a throw and the last statement as tails", () => {
      const graph = graphOf(
        ifGoto(b, "bail"),
        nop(),
        { type: "ThrowStmt", value: i, label: "bail" }
      );
      assert.deepEqual(graph.succsOf(1), [2]);
      assert.deepEqual(graph.tails, [2]);

      const open = graphOf(nop(), nop());
      assert.deepEqual(open.tails, [1]);
    });

    it("maps statements to their index", () => {
      const second = nop();
      const graph = graphOf(nop(), second);
      assert.strictEqual(graph.indexOf(second), 1);
      assert.strictEqual(graph.statements[1], second);
      assert.throws(() => graph.indexOf(nop()), /not part of this graph/);
    });

    it("rejects branches to unknown labels", () => {
      assert.throws(() => graphOf(goto("nowhere")), /unknown label nowhere/);
    });

    it("rejects duplicate labels", () => {
      assert.throws(() => graphOf(nop("a"), nop("a")), /Duplicate label a/);
    });

    it("handles an empty body", () => {
      const graph = new StatementGraph({ method, units: [] });
      assert.deepEqual(graph.heads, []);
      assert.deepEqual(graph.tails, []);
      assert.deepEqual(getReversePostOrder(graph), []);
    });
  });

  describe("Traversal order", () => {
    const i = local("i");
    const b = local("b");

    it("visits loops in reverse post order", () => {
      const graph = graphOf(
        call(i, "hasNext", [], "head"),
        ifGoto(b, "end"),
        call(i, "next"),
        goto("head"),
        ret("end")
      );
      assert.deepEqual(getPostOrder(graph), [3, 2, 4, 1, 0]);
      assert.deepEqual(getReversePostOrder(graph), [0, 1, 4, 2, 3]);
    });

    it("walks very long straight-line bodies", () => {
      const units: Stmt[] = [call(i, "e")];
      for (let n = 0; n < 20000; n++) units.push(nop());
      units.push(ret());
      const graph = new StatementGraph({ method, units });
      const order = getReversePostOrder(graph);
      assert.strictEqual(order.length, 20002);
      assert.strictEqual(order[0], 0);
      assert.strictEqual(order[20001], 20001);
      assert.strictEqual(getPostOrder(graph)[0], 20001);
    });

    it("appends unreachable statements in program order", () => {
      const graph = graphOf(ret(), nop(), nop());
      assert.deepEqual(getReversePostOrder(graph), [0, 1, 2]);
      assert.deepEqual(graph.tails, [0, 2]);
    });
  });
}
