import { ControlFlowGraph } from "./control-flow";
import { getDefinedLocals, isLocal, Local, Stmt } from "./ir";
import { Shadow, ShadowGroup, sameMethod } from "./shadow";

export type Bindings = {
  // tracematch formal -> the local whose value it is bound to
  formalToLocal: ReadonlyMap<string, Local>;
  // advice actual (a shadow's bound local) -> that same local
  actualToLocal: ReadonlyMap<Local, Local>;
};

export type BindingResult =
  | { resolved: true; bindings: Bindings }
  | { resolved: false; bindings: Bindings; stmt: Stmt; local: Local };

/*
 * For every shadow of the group that shares the initial shadow's
 * tracematch and container, find the assignments to its bound
 * locals. Each must copy one local into another; anything else
 * (a field read, a call result, a parameter) leaves the binding
 * unresolvable.
 *
 * The whole graph is always scanned. On failure the maps hold
 * whatever was recorded, and `stmt` is the first offender.
 */
export function extractBindings(
  graph: ControlFlowGraph,
  group: ShadowGroup,
  initialShadow: Shadow
): BindingResult {
  const formalToLocal = new Map<string, Local>();
  const actualToLocal = new Map<Local, Local>();
  let failure: { stmt: Stmt; local: Local } | null = null;

  for (const shadow of group.allShadows) {
    if (
      shadow.traceMatch !== initialShadow.traceMatch ||
      !sameMethod(shadow.container, initialShadow.container)
    ) {
      continue;
    }
    for (const stmt of graph.statements) {
      for (const local of getDefinedLocals(stmt)) {
        if (!shadow.boundLocals.has(local)) continue;
        if (
          stmt.type === "AssignStmt" &&
          isLocal(stmt.left) &&
          isLocal(stmt.right)
        ) {
          const lv = stmt.left;
          const rv = stmt.right;
          actualToLocal.set(lv, rv);
          const formal = shadow.varNameForLocal(lv);
          if (formal != null) formalToLocal.set(formal, rv);
        } else if (!failure) {
          failure = { stmt, local };
        }
      }
    }
  }

  const bindings = { formalToLocal, actualToLocal };
  return failure
    ? { resolved: false, bindings, ...failure }
    : { resolved: true, bindings };
}

export function trackedLocals(bindings: Bindings) {
  return new Set(bindings.actualToLocal.values());
}
