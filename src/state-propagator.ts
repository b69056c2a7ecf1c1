import assert from "node:assert";
import { AutomatonNode, describeNodes, TraceMatch } from "./automaton";
import { Bindings, extractBindings, trackedLocals } from "./bindings";
import { CallGraph, SideEffectOracle, toSideEffectOracle } from "./call-graph";
import { ControlFlowGraph } from "./control-flow";
import { ForwardFlowAnalysis } from "./flow-analysis";
import { formatStmt, getDefinedLocals, Local, methodName, Stmt } from "./ir";
import { Shadow, ShadowGroup, ShadowLookup } from "./shadow";
import { TransitionOracle } from "./transition";
import { isSubset, logger, sameSets, wouldLog } from "./util";

export type StateSet = Set<AutomatonNode>;

export type GiveUpReason =
  | "unresolvable-binding"
  | "side-effect"
  | "binding-invalidated"
  | "final-reachable";

export type AnalysisStatus =
  | { kind: "running" }
  | { kind: "gave-up"; reason: GiveUpReason; stmt: Stmt | null };

export type StatePropagatorOptions = {
  shadows: ShadowLookup;
  sideEffects: CallGraph | SideEffectOracle;
  transitions: TransitionOracle;
};

/*
 * Propagates sets of automaton states through a method, starting
 * from the initial configuration at the statement of one shadow.
 * Assumes everything involved is thread local.
 *
 * A set with several states means the automaton may be in any of
 * them at that point.
 *
 * Known holes, left as is:
 *  - skip loops: going back to an initial state is only right if
 *    the skip loop fired for the same object as the initial
 *    shadow. We don't check that.
 *  - the method is assumed to be entered with the automaton in
 *    its initial configuration at the initial shadow.
 *  - other threads are ignored.
 */
export class StatePropagator extends ForwardFlowAnalysis<StateSet> {
  readonly traceMatch: TraceMatch;
  readonly initialStmt: Stmt;
  readonly initialStates: ReadonlySet<AutomatonNode>;
  readonly bindings: Bindings;
  private readonly tracked: ReadonlySet<Local>;
  private readonly sideEffects: SideEffectOracle;
  private readonly transitions: TransitionOracle;
  private initializedInitial = false;
  private seedCount = 0;
  private currentStatus: AnalysisStatus = { kind: "running" };

  constructor(
    graph: ControlFlowGraph,
    initialShadowGroup: ShadowGroup,
    readonly initialShadow: Shadow,
    options: StatePropagatorOptions
  ) {
    super(graph);
    this.traceMatch = initialShadow.traceMatch;
    this.sideEffects = toSideEffectOracle(options.sideEffects);
    this.transitions = options.transitions;

    const initialStates = new Set<AutomatonNode>();
    for (const state of this.traceMatch.stateMachine.nodes()) {
      if (state.isInitial) initialStates.add(state);
    }
    this.initialStates = initialStates;

    const initialStmts = graph.statements.filter((stmt) =>
      options.shadows
        .activeShadowsAt(stmt, graph.method)
        .includes(initialShadow)
    );
    const [initialStmt] = initialStmts;
    assert(
      initialStmt,
      `Shadow ${initialShadow} is not active anywhere in ${methodName(
        graph.method
      )}`
    );
    assert(
      initialStmts.length === 1,
      `Shadow ${initialShadow} is active at ${
        initialStmts.length
      } statements in ${methodName(graph.method)}`
    );
    this.initialStmt = initialStmt;

    const result = extractBindings(graph, initialShadowGroup, initialShadow);
    this.bindings = result.bindings;
    this.tracked = trackedLocals(result.bindings);
    if (!result.resolved) {
      this.giveUp("unresolvable-binding", result.stmt);
    }

    this.doAnalysis();

    logger(
      "state-propagator",
      1,
      () =>
        `${initialShadow} in ${methodName(graph.method)}: ${
          this.isSafelyInvariant() ? "invariant" : "not invariant"
        }${
          this.currentStatus.kind === "gave-up"
            ? ` (gave up: ${this.currentStatus.reason}${
                this.currentStatus.stmt
                  ? ` at ${formatStmt(this.currentStatus.stmt)}`
                  : ""
              })`
            : ""
        }`
    );
    if (wouldLog("state-propagator", 10)) {
      logger("state-propagator", 10, this.describeFlow());
    }
  }

  get status(): AnalysisStatus {
    return this.currentStatus;
  }

  get gaveUp() {
    return this.currentStatus.kind === "gave-up";
  }

  // How many times the initial states were injected. Always 0 or 1.
  get seedInjections() {
    return this.seedCount;
  }

  /*
   * True if the graph never drives the tracematch of the initial
   * shadow into a final state, and always leaves its automaton in
   * an initial configuration on exit.
   */
  isSafelyInvariant() {
    if (this.gaveUp) {
      return false;
    }
    // A final state would have made us give up, so it's enough to
    // check that every tail is back in an initial state.
    return this.graph.tails.every((tail) =>
      isSubset(this.afterFlow[tail], this.initialStates)
    );
  }

  flowBefore(stmt: Stmt): ReadonlySet<AutomatonNode> {
    return this.getFlowBefore(stmt);
  }

  flowAfter(stmt: Stmt): ReadonlySet<AutomatonNode> {
    return this.getFlowAfter(stmt);
  }

  describeFlow() {
    return this.graph.statements
      .map(
        (stmt, i) =>
          `${i}: ${formatStmt(stmt)}  ${describeNodes(
            this.beforeFlow[i]
          )} -> ${describeNodes(this.afterFlow[i])}`
      )
      .join("\n");
  }

  private giveUp(reason: GiveUpReason, stmt: Stmt | null) {
    if (this.currentStatus.kind === "gave-up") return;
    this.currentStatus = { kind: "gave-up", reason, stmt };
    logger(
      "state-propagator",
      5,
      () => `giving up (${reason})${stmt ? ` at ${formatStmt(stmt)}` : ""}`
    );
  }

  protected newInitialFlow(): StateSet {
    return new Set();
  }

  protected entryInitialFlow(): StateSet {
    return this.newInitialFlow();
  }

  protected copy(src: StateSet, dest: StateSet) {
    if (src === dest) return;
    dest.clear();
    src.forEach((state) => dest.add(state));
  }

  protected merge(in1: StateSet, in2: StateSet, out: StateSet) {
    const union = new Set([...in1, ...in2]);
    this.copy(union, out);
  }

  protected equals(a: StateSet, b: StateSet) {
    return sameSets(a, b);
  }

  protected flowThrough(inVal: StateSet, stmt: Stmt, outVal: StateSet) {
    if (this.gaveUp) {
      return;
    }

    // If this statement may affect the automaton from elsewhere,
    // we have no idea what configurations it could produce.
    if (this.sideEffects.mayTrigger(stmt)) {
      this.giveUp("side-effect", stmt);
      return;
    }

    if (stmt === this.initialStmt && !this.initializedInitial) {
      this.initialStates.forEach((state) => inVal.add(state));
      this.initializedInitial = true;
      this.seedCount++;
    }

    // An empty set means the initial shadow hasn't been seen yet, so
    // redefinitions don't matter.
    if (inVal.size) {
      if (getDefinedLocals(stmt).some((local) => this.tracked.has(local))) {
        this.giveUp("binding-invalidated", stmt);
      }
    }

    const out: StateSet = new Set();
    for (const state of inVal) {
      const successors = this.transitions.successors(
        state,
        this.traceMatch,
        stmt,
        this.initialStates,
        this.bindings.formalToLocal,
        this.bindings.actualToLocal
      );
      for (const succ of successors) {
        if (succ.isFinal) {
          this.giveUp("final-reachable", stmt);
          return;
        }
        out.add(succ);
      }
    }
    if (wouldLog("state-propagator", 5)) {
      logger(
        "state-propagator",
        5,
        `${formatStmt(stmt)}: ${describeNodes(inVal)} -> ${describeNodes(out)}`
      );
    }
    this.copy(out, outVal);
  }
}
