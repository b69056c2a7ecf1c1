import { AutomatonNode, TraceMatch } from "./automaton";
import { Local, MethodRef, Stmt } from "./ir";
import { Shadow, ShadowLookup } from "./shadow";

/*
 * Successor configurations of `node` when `stmt` executes.
 * Implementations must be pure; the fixpoint relies on getting
 * the same answer for the same question.
 */
export interface TransitionOracle {
  successors(
    node: AutomatonNode,
    traceMatch: TraceMatch,
    stmt: Stmt,
    initialNodes: ReadonlySet<AutomatonNode>,
    formalToLocal: ReadonlyMap<string, Local>,
    actualToLocal: ReadonlyMap<Local, Local>
  ): ReadonlySet<AutomatonNode>;
}

/*
 * Fires the symbols of the shadows of `traceMatch` that are active
 * at a statement.
 *
 * A shadow whose bindings all resolve to the locals we are
 * tracking moves the configuration along its symbol's edges. A
 * shadow that might concern some other object can also leave the
 * configuration where it was.
 */
export class ShadowTransitionOracle implements TransitionOracle {
  constructor(
    private readonly shadows: ShadowLookup,
    private readonly container: MethodRef
  ) {}

  successors(
    node: AutomatonNode,
    traceMatch: TraceMatch,
    stmt: Stmt,
    initialNodes: ReadonlySet<AutomatonNode>,
    formalToLocal: ReadonlyMap<string, Local>,
    actualToLocal: ReadonlyMap<Local, Local>
  ): ReadonlySet<AutomatonNode> {
    let current = new Set([node]);
    this.relevantShadows(stmt, traceMatch).forEach((shadow) => {
      const definite = bindsTrackedObject(shadow, formalToLocal, actualToLocal);
      const next = new Set<AutomatonNode>();
      current.forEach((n) => {
        fire(traceMatch, n, shadow.symbol, initialNodes).forEach((s) =>
          next.add(s)
        );
        if (!definite) next.add(n);
      });
      current = next;
    });
    return current;
  }

  private relevantShadows(stmt: Stmt, traceMatch: TraceMatch) {
    return this.shadows
      .activeShadowsAt(stmt, this.container)
      .filter((shadow) => shadow.traceMatch === traceMatch);
  }
}

export function bindsTrackedObject(
  shadow: Shadow,
  formalToLocal: ReadonlyMap<string, Local>,
  actualToLocal: ReadonlyMap<Local, Local>
) {
  for (const [formal, actual] of shadow.bindings) {
    const tracked = formalToLocal.get(formal);
    if (!tracked) return false;
    const resolved = actualToLocal.get(actual) ?? actual;
    if (resolved !== tracked) return false;
  }
  return true;
}

function fire(
  traceMatch: TraceMatch,
  node: AutomatonNode,
  symbol: string,
  initialNodes: ReadonlySet<AutomatonNode>
): ReadonlySet<AutomatonNode> {
  const sm = traceMatch.stateMachine;
  const edges = sm.edgesFrom(node, symbol);
  if (edges.length) {
    return new Set(edges.map((e) => e.target));
  }
  if (sm.hasSkipLoop(node, symbol)) {
    return new Set([node]);
  }
  // No way to continue: the partial match is discarded.
  return initialNodes;
}
