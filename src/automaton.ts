import assert from "node:assert";

export interface AutomatonNode {
  readonly id: number;
  readonly isInitial: boolean;
  readonly isFinal: boolean;
  readonly label?: string;
}

export type AutomatonEdge = {
  source: AutomatonNode;
  target: AutomatonNode;
  symbol: string;
  // A skip loop: the configuration stays put when the symbol
  // fires for some other binding.
  skip?: boolean;
};

export type StateMachineInit = {
  nodes: Array<{ label?: string; initial?: boolean; final?: boolean }>;
  edges?: Array<{ from: number; to: number; symbol: string; skip?: boolean }>;
};

export class StateMachine {
  private readonly nodeList: AutomatonNode[] = [];
  private readonly edgeList: AutomatonEdge[] = [];

  constructor(init?: StateMachineInit) {
    if (!init) return;
    init.nodes.forEach((n) =>
      this.addNode({
        label: n.label,
        isInitial: !!n.initial,
        isFinal: !!n.final,
      })
    );
    init.edges?.forEach((e) => {
      assert(
        e.from >= 0 && e.from < this.nodeList.length,
        `Bad edge source ${e.from}`
      );
      assert(e.to >= 0 && e.to < this.nodeList.length, `Bad edge target ${e.to}`);
      this.addEdge(this.nodeList[e.from], this.nodeList[e.to], e.symbol, e.skip);
    });
  }

  addNode(node: Omit<AutomatonNode, "id">) {
    const n: AutomatonNode = { ...node, id: this.nodeList.length };
    this.nodeList.push(n);
    return n;
  }

  addEdge(
    source: AutomatonNode,
    target: AutomatonNode,
    symbol: string,
    skip?: boolean
  ) {
    if (!this.owns(source) || !this.owns(target)) {
      throw new Error(
        `Edge ${describeNode(source)} -> ${describeNode(
          target
        )} uses a node from another state machine`
      );
    }
    const edge: AutomatonEdge = { source, target, symbol };
    if (skip) {
      assert(source === target, "A skip edge must be a loop");
      edge.skip = true;
    }
    this.edgeList.push(edge);
    return edge;
  }

  owns(node: AutomatonNode) {
    return this.nodeList[node.id] === node;
  }

  nodes(): IterableIterator<AutomatonNode> {
    return this.nodeList.values();
  }

  node(id: number) {
    const n = this.nodeList[id];
    if (!n) throw new Error(`No node ${id}`);
    return n;
  }

  get size() {
    return this.nodeList.length;
  }

  initialNodes() {
    return new Set(this.nodeList.filter((n) => n.isInitial));
  }

  edges(): readonly AutomatonEdge[] {
    return this.edgeList;
  }

  /*
   * Non-skip edges leaving `node` on `symbol`.
   */
  edgesFrom(node: AutomatonNode, symbol: string) {
    return this.edgeList.filter(
      (e) => e.source === node && e.symbol === symbol && !e.skip
    );
  }

  hasSkipLoop(node: AutomatonNode, symbol: string) {
    return this.edgeList.some(
      (e) => e.source === node && e.symbol === symbol && e.skip
    );
  }
}

export type TraceMatch = {
  name: string;
  formals: string[];
  symbols: string[];
  stateMachine: StateMachine;
};

export function describeNode(node: AutomatonNode) {
  const flags =
    (node.isInitial ? "i" : "") + (node.isFinal ? "f" : "");
  return `${node.label ?? `s${node.id}`}${flags ? `[${flags}]` : ""}`;
}

export function describeNodes(nodes: Iterable<AutomatonNode>) {
  return `{${Array.from(nodes)
    .sort((a, b) => a.id - b.id)
    .map(describeNode)
    .join(", ")}}`;
}
