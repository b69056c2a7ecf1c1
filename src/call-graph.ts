import { MethodRef, Stmt } from "./ir";

/*
 * Whether a statement may, transitively, cause some shadow
 * anywhere in the program to fire.
 */
export interface SideEffectOracle {
  mayTrigger(stmt: Stmt): boolean;
}

export type CallEdge = {
  src: Stmt;
  tgt: MethodRef;
};

/*
 * An abstracted call graph: it only keeps the edges that lead,
 * possibly through further calls, to a method containing a shadow.
 */
export class CallGraph {
  private readonly edges = new Map<Stmt, CallEdge[]>();

  addEdge(src: Stmt, tgt: MethodRef) {
    const edge = { src, tgt };
    const out = this.edges.get(src);
    if (out) {
      out.push(edge);
    } else {
      this.edges.set(src, [edge]);
    }
    return edge;
  }

  edgesOutOf(stmt: Stmt): readonly CallEdge[] {
    return this.edges.get(stmt) ?? [];
  }
}

export class CallGraphSideEffects implements SideEffectOracle {
  constructor(private readonly callGraph: CallGraph) {}

  mayTrigger(stmt: Stmt) {
    return this.callGraph.edgesOutOf(stmt).length > 0;
  }
}

export function toSideEffectOracle(
  source: CallGraph | SideEffectOracle
): SideEffectOracle {
  return source instanceof CallGraph ? new CallGraphSideEffects(source) : source;
}
