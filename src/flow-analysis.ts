import { ControlFlowGraph, getReversePostOrder } from "./control-flow";
import { Stmt } from "./ir";
import { GenericQueue, logger, wouldLog } from "./util";

export class DataflowQueue extends GenericQueue<number> {
  constructor(order: readonly number[]) {
    super((b, a) => order[a] - order[b]);
  }
}

/*
 * A forward dataflow analysis over a ControlFlowGraph.
 *
 * Each statement owns one flow value before it and one after it;
 * values are never shared between statements. A statement's
 * before value accumulates the after values of its predecessors,
 * so it only grows as long as `merge` is a join.
 *
 * Subclasses call doAnalysis() once they are fully constructed.
 */
export abstract class ForwardFlowAnalysis<A> {
  protected readonly beforeFlow: A[];
  protected readonly afterFlow: A[];
  private visits = 0;

  constructor(protected readonly graph: ControlFlowGraph) {
    this.beforeFlow = [];
    this.afterFlow = [];
  }

  protected abstract newInitialFlow(): A;
  protected abstract entryInitialFlow(): A;
  protected abstract merge(in1: A, in2: A, out: A): void;
  protected abstract copy(src: A, dest: A): void;
  protected abstract equals(a: A, b: A): boolean;
  protected abstract flowThrough(inVal: A, stmt: Stmt, outVal: A): void;

  protected doAnalysis() {
    const graph = this.graph;
    const rpo = getReversePostOrder(graph);
    // order[i] is the position of statement i in reverse post order
    const order: number[] = [];
    rpo.forEach((index, i) => {
      order[index] = i;
    });

    const heads = new Set(graph.heads);
    graph.statements.forEach((_stmt, i) => {
      this.beforeFlow[i] = heads.has(i)
        ? this.entryInitialFlow()
        : this.newInitialFlow();
      this.afterFlow[i] = this.newInitialFlow();
    });

    const queue = new DataflowQueue(order);
    rpo.forEach((index) => queue.enqueue(index));

    const logging = wouldLog("flow-analysis", 5);
    const previous = this.newInitialFlow();
    while (!queue.empty()) {
      const top = queue.dequeue();
      if (order[top] === undefined) {
        throw new Error(`Statement ${top} was visited without an order`);
      }
      this.visits++;
      const before = this.beforeFlow[top];
      graph
        .predsOf(top)
        .forEach((pred) => this.merge(before, this.afterFlow[pred], before));

      const after = this.afterFlow[top];
      this.copy(after, previous);
      this.flowThrough(before, graph.statements[top], after);

      if (!this.equals(previous, after)) {
        graph.succsOf(top).forEach((succ) => {
          if (logging) {
            logger("flow-analysis", 5, `re-merge: ${top} -> ${succ}`);
          }
          queue.enqueue(succ);
        });
      }
    }
  }

  get visitCount() {
    return this.visits;
  }

  getFlowBefore(stmt: Stmt): A {
    return this.beforeFlow[this.graph.indexOf(stmt)];
  }

  getFlowAfter(stmt: Stmt): A {
    return this.afterFlow[this.graph.indexOf(stmt)];
  }
}
