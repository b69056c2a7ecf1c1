import { CallGraph, SideEffectOracle } from "./call-graph";
import { ControlFlowGraph } from "./control-flow";
import { methodName } from "./ir";
import { Shadow, ShadowGroup, ShadowLookup, sameMethod } from "./shadow";
import { AnalysisStatus, StatePropagator } from "./state-propagator";
import { ShadowTransitionOracle, TransitionOracle } from "./transition";
import { logger } from "./util";

export * from "./automaton";
export * from "./bindings";
export * from "./call-graph";
export * from "./control-flow";
export * from "./flow-analysis";
export * from "./ir";
export * from "./shadow";
export * from "./state-propagator";
export * from "./transition";
export { bumpLogging, log, logger, setLogger, wouldLog } from "./logger";

export type AnalysisOptions = {
  sideEffects: CallGraph | SideEffectOracle;
  // Defaults to a ShadowTransitionOracle over `shadows`
  transitionOracle?: TransitionOracle;
};

export type ShadowVerdict = {
  shadow: Shadow;
  group: ShadowGroup;
  invariant: boolean;
  status: AnalysisStatus;
};

/*
 * Run the state propagation for every shadow of `groups` that is
 * active in the method of `graph`. A shadow whose verdict is
 * `invariant` leaves its automaton where it found it, so the
 * method doesn't need runtime state tracking on its account.
 *
 * A shadow that belongs to several groups gets one verdict per
 * group.
 */
export function findInvariantShadows(
  graph: ControlFlowGraph,
  groups: Iterable<ShadowGroup>,
  shadows: ShadowLookup,
  options: AnalysisOptions
): ShadowVerdict[] {
  const active = new Set<Shadow>();
  graph.statements.forEach((stmt) =>
    shadows
      .activeShadowsAt(stmt, graph.method)
      .forEach((shadow) => active.add(shadow))
  );
  const transitions =
    options.transitionOracle ??
    new ShadowTransitionOracle(shadows, graph.method);

  const verdicts: ShadowVerdict[] = [];
  for (const group of groups) {
    for (const shadow of group.allShadows) {
      if (!sameMethod(shadow.container, graph.method) || !active.has(shadow)) {
        continue;
      }
      const analysis = new StatePropagator(graph, group, shadow, {
        shadows,
        sideEffects: options.sideEffects,
        transitions,
      });
      verdicts.push({
        shadow,
        group,
        invariant: analysis.isSafelyInvariant(),
        status: analysis.status,
      });
    }
  }
  logger(
    "state-propagator",
    1,
    () =>
      `${methodName(graph.method)}: ${
        verdicts.filter((v) => v.invariant).length
      } of ${verdicts.length} shadow(s) invariant`
  );
  return verdicts;
}
