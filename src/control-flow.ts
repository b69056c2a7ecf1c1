import assert from "node:assert";
import { Body, MethodRef, Stmt } from "./ir";
import { pushUnique } from "./util";

/*
 * A statement level control flow graph. Statements are
 * identified by their index into `statements`.
 */
export interface ControlFlowGraph {
  readonly method: MethodRef;
  readonly statements: readonly Stmt[];
  indexOf(stmt: Stmt): number;
  succsOf(index: number): readonly number[];
  predsOf(index: number): readonly number[];
  readonly heads: readonly number[];
  readonly tails: readonly number[];
}

/*
 * A "brief" graph: fall-through and branch edges only. Exceptional
 * edges are not modelled, so a throw is simply a tail.
 */
export class StatementGraph implements ControlFlowGraph {
  readonly method: MethodRef;
  readonly statements: readonly Stmt[];
  readonly heads: readonly number[];
  readonly tails: readonly number[];
  private succs: number[][];
  private preds: number[][];
  private index = new Map<Stmt, number>();

  constructor(body: Body) {
    this.method = body.method;
    this.statements = body.units;
    this.succs = body.units.map(() => []);
    this.preds = body.units.map(() => []);

    const labels = new Map<string, number>();
    body.units.forEach((stmt, i) => {
      assert(!this.index.has(stmt), `Statement ${i} appears twice in body`);
      this.index.set(stmt, i);
      if (stmt.label != null) {
        if (labels.has(stmt.label)) {
          throw new Error(`Duplicate label ${stmt.label}`);
        }
        labels.set(stmt.label, i);
      }
    });
    const target = (label: string) => {
      const t = labels.get(label);
      if (t == null) {
        throw new Error(`Branch to unknown label ${label}`);
      }
      return t;
    };

    body.units.forEach((stmt, i) => {
      const next = i + 1 < body.units.length ? i + 1 : null;
      switch (stmt.type) {
        case "GotoStmt":
          this.addEdge(i, target(stmt.target));
          break;
        case "IfStmt":
          if (next != null) this.addEdge(i, next);
          this.addEdge(i, target(stmt.target));
          break;
        case "ReturnStmt":
        case "ThrowStmt":
          break;
        default:
          if (next != null) this.addEdge(i, next);
      }
    });

    this.heads = body.units.length ? [0] : [];
    this.tails = body.units
      .map((_stmt, i) => i)
      .filter((i) => !this.succs[i].length);
  }

  private addEdge(from: number, to: number) {
    pushUnique(this.succs[from], to);
    pushUnique(this.preds[to], from);
  }

  indexOf(stmt: Stmt) {
    const i = this.index.get(stmt);
    if (i == null) {
      throw new Error("Statement is not part of this graph");
    }
    return i;
  }

  succsOf(index: number): readonly number[] {
    return this.succs[index];
  }

  predsOf(index: number): readonly number[] {
    return this.preds[index];
  }
}

export function postOrderTraverse(
  graph: ControlFlowGraph,
  visitor: (index: number) => void
) {
  const visited = new Set<number>();
  // Bodies can be thousands of statements long, so keep our own
  // stack rather than recursing once per statement.
  const stack: Array<{ index: number; next: number }> = [];
  graph.heads.forEach((head) => {
    if (visited.has(head)) return;
    visited.add(head);
    stack.push({ index: head, next: 0 });
    while (stack.length) {
      const top = stack[stack.length - 1];
      const succs = graph.succsOf(top.index);
      if (top.next < succs.length) {
        const succ = succs[top.next++];
        if (!visited.has(succ)) {
          visited.add(succ);
          stack.push({ index: succ, next: 0 });
        }
      } else {
        stack.pop();
        visitor(top.index);
      }
    }
  });
}

export function getPostOrder(graph: ControlFlowGraph) {
  const order: number[] = [];
  postOrderTraverse(graph, (index) => order.push(index));
  return order;
}

/*
 * Reverse post order of the reachable statements, followed by
 * any unreachable ones in program order.
 */
export function getReversePostOrder(graph: ControlFlowGraph) {
  const order = getPostOrder(graph).reverse();
  if (order.length < graph.statements.length) {
    const seen = new Set(order);
    graph.statements.forEach((_stmt, i) => {
      if (!seen.has(i)) order.push(i);
    });
  }
  return order;
}
