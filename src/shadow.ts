import { TraceMatch } from "./automaton";
import { Local, MethodRef, Stmt } from "./ir";

/*
 * A program point at which a symbol of a tracematch may fire.
 * `bindings` maps each free variable the symbol binds to the
 * local that holds its value at this point.
 */
export class Shadow {
  readonly boundLocals: ReadonlySet<Local>;
  private readonly varNames = new Map<Local, string>();

  constructor(
    readonly id: string,
    readonly traceMatch: TraceMatch,
    readonly container: MethodRef,
    readonly symbol: string,
    readonly bindings: ReadonlyMap<string, Local>
  ) {
    bindings.forEach((local, name) => this.varNames.set(local, name));
    this.boundLocals = new Set(bindings.values());
  }

  varNameForLocal(local: Local) {
    return this.varNames.get(local);
  }

  toString() {
    return `${this.traceMatch.name}.${this.symbol}#${this.id}`;
  }
}

export type ShadowGroup = {
  label?: string;
  allShadows: ReadonlySet<Shadow>;
};

export interface ShadowLookup {
  activeShadowsAt(stmt: Stmt, method: MethodRef): readonly Shadow[];
}

export class ShadowRegistry implements ShadowLookup {
  private readonly byStmt = new Map<Stmt, Shadow[]>();

  register(stmt: Stmt, shadow: Shadow) {
    const shadows = this.byStmt.get(stmt);
    if (shadows) {
      if (!shadows.includes(shadow)) shadows.push(shadow);
    } else {
      this.byStmt.set(stmt, [shadow]);
    }
    return this;
  }

  activeShadowsAt(stmt: Stmt, method: MethodRef): readonly Shadow[] {
    const shadows = this.byStmt.get(stmt);
    if (!shadows) return [];
    return shadows.filter((shadow) => sameMethod(shadow.container, method));
  }
}

export function sameMethod(a: MethodRef, b: MethodRef) {
  return a === b || (a.declaringClass === b.declaringClass && a.name === b.name);
}
