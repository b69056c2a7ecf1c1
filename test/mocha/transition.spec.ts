import { assert } from "chai";
import { Local, Stmt } from "../../src/ir";
import { ShadowRegistry } from "../../src/shadow";
import {
  bindsTrackedObject,
  ShadowTransitionOracle,
} from "../../src/transition";
import {
  call,
  hasNextMatch,
  labels,
  local,
  method,
  nop,
  registryOf,
  shadow,
  traceMatch,
} from "./test-utils";

export function transitionTests() {
  describe("ShadowTransitionOracle", () => {
    const i = local("i");
    const i2 = local("i2");
    const src = local("it");
    const tm = hasNextMatch();
    const sm = tm.stateMachine;
    const [q0, q1, q2] = [sm.node(0), sm.node(1), sm.node(2)];
    const initial = sm.initialNodes();
    const formals = new Map<string, Local>([["i", src]]);
    const actuals = new Map<Local, Local>([[i, src]]);

    function fireAt(
      registry: ShadowRegistry,
      stmt: Stmt,
      node = q0,
      formalToLocal: ReadonlyMap<string, Local> = formals
    ) {
      const oracle = new ShadowTransitionOracle(registry, method);
      return labels(
        oracle.successors(node, tm, stmt, initial, formalToLocal, actuals)
      );
    }

    it("leaves the state alone where no shadow is active", () => {
      const stmt = nop();
      assert.deepEqual(fireAt(registryOf(), stmt), ["q0"]);
      assert.deepEqual(fireAt(registryOf(), stmt, q1), ["q1"]);
    });

    it("follows edges for a shadow bound to the tracked object", () => {
      const stmt = call(i, "next");
      const registry = registryOf([stmt, shadow("n", tm, "next", { i })]);
      assert.deepEqual(fireAt(registry, stmt), ["q1"]);
      assert.deepEqual(fireAt(registry, stmt, q1), ["q2"]);
    });

    it("stays put on a skip loop", () => {
      const stmt = call(i, "hasNext");
      const registry = registryOf([stmt, shadow("h", tm, "hasNext", { i })]);
      assert.deepEqual(fireAt(registry, stmt), ["q0"]);
      assert.deepEqual(fireAt(registry, stmt, q1), ["q0"]);
    });

    it("discards the partial match when nothing can follow", () => {
      const stmt = call(i, "next");
      const registry = registryOf([stmt, shadow("n", tm, "next", { i })]);
      assert.deepEqual(fireAt(registry, stmt, q2), ["q0"]);
    });

    it("may also stay put for a shadow on another object", () => {
      const stmt = call(i2, "next");
      const registry = registryOf([stmt, shadow("n", tm, "next", { i: i2 })]);
      assert.deepEqual(fireAt(registry, stmt), ["q0", "q1"]);
    });

    it("treats an untracked formal as a possible other object", () => {
      const stmt = call(i, "next");
      const registry = registryOf([stmt, shadow("n", tm, "next", { i })]);
      assert.deepEqual(fireAt(registry, stmt, q0, new Map()), ["q0", "q1"]);
    });

    it("ignores shadows of other tracematches", () => {
      const other = traceMatch("Other", {
        nodes: [{ initial: true }, { final: true }],
        edges: [{ from: 0, to: 1, symbol: "next" }],
      });
      const stmt = call(i, "next");
      const registry = registryOf([stmt, shadow("o", other, "next", { i })]);
      assert.deepEqual(fireAt(registry, stmt), ["q0"]);
    });

    it("applies several shadows at one statement in order", () => {
      const stmt = call(i, "hasNextAndNext");
      const registry = registryOf(
        [stmt, shadow("h", tm, "hasNext", { i })],
        [stmt, shadow("n", tm, "next", { i })]
      );
      assert.deepEqual(fireAt(registry, stmt, q1), ["q1"]);
    });

    it("gives the same answer every time", () => {
      const stmt = call(i2, "next");
      const registry = registryOf([stmt, shadow("n", tm, "next", { i: i2 })]);
      const oracle = new ShadowTransitionOracle(registry, method);
      const first = oracle.successors(q1, tm, stmt, initial, formals, actuals);
      const second = oracle.successors(q1, tm, stmt, initial, formals, actuals);
      assert.deepEqual(labels(first), ["q1", "q2"]);
      assert.deepEqual(labels(second), labels(first));
    });
  });

  describe("bindsTrackedObject", () => {
    const tm = hasNextMatch();
    const i = local("i");
    const src = local("it");

    it("resolves a shadow's locals through the actual map", () => {
      const s = shadow("n", tm, "next", { i });
      assert.isTrue(
        bindsTrackedObject(s, new Map([["i", src]]), new Map([[i, src]]))
      );
    });

    it("accepts the tracked local itself", () => {
      const s = shadow("n", tm, "next", { i: src });
      assert.isTrue(bindsTrackedObject(s, new Map([["i", src]]), new Map()));
    });

    it("rejects a different local", () => {
      const s = shadow("n", tm, "next", { i });
      assert.isFalse(bindsTrackedObject(s, new Map([["i", src]]), new Map()));
    });
  });
}
