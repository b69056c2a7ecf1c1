/*
 * A small three-address intermediate representation.
 *
 * Locals, statements and methods are compared by identity, so a
 * Body must use the same Local object for every occurrence of a
 * variable.
 */

export type MethodRef = {
  declaringClass: string;
  name: string;
};

export type Local = {
  type: "Local";
  name: string;
};

export type ParameterRef = {
  type: "ParameterRef";
  index: number;
};

export type ThisRef = {
  type: "ThisRef";
};

export type FieldRef = {
  type: "FieldRef";
  // null for a static field
  base: Local | null;
  field: string;
};

export type Constant = {
  type: "Constant";
  value: string | number | boolean | null;
};

export type InvokeExpr = {
  type: "InvokeExpr";
  method: MethodRef;
  // null for a static call
  base: Local | null;
  args: Immediate[];
};

export type NewExpr = {
  type: "NewExpr";
  className: string;
};

export type BinopExpr = {
  type: "BinopExpr";
  operator: string;
  left: Immediate;
  right: Immediate;
};

export type Immediate = Local | Constant;

export type Value =
  | Immediate
  | ParameterRef
  | ThisRef
  | FieldRef
  | InvokeExpr
  | NewExpr
  | BinopExpr;

interface BaseStmt {
  type: string;
  label?: string;
}

export interface AssignStmt extends BaseStmt {
  type: "AssignStmt";
  left: Local | FieldRef;
  right: Value;
}

export interface IdentityStmt extends BaseStmt {
  type: "IdentityStmt";
  left: Local;
  right: ParameterRef | ThisRef;
}

export interface InvokeStmt extends BaseStmt {
  type: "InvokeStmt";
  expr: InvokeExpr;
}

export interface IfStmt extends BaseStmt {
  type: "IfStmt";
  condition: Value;
  target: string;
}

export interface GotoStmt extends BaseStmt {
  type: "GotoStmt";
  target: string;
}

export interface ReturnStmt extends BaseStmt {
  type: "ReturnStmt";
  value: Immediate | null;
}

export interface ThrowStmt extends BaseStmt {
  type: "ThrowStmt";
  value: Local;
}

export interface NopStmt extends BaseStmt {
  type: "NopStmt";
}

export type Stmt =
  | AssignStmt
  | IdentityStmt
  | InvokeStmt
  | IfStmt
  | GotoStmt
  | ReturnStmt
  | ThrowStmt
  | NopStmt;

export type Body = {
  method: MethodRef;
  units: Stmt[];
};

export function unhandledType(node: never): never {
  throw new Error(
    `Unhandled statement type: ${(node as { type: string }).type}`
  );
}

export function isLocal(value: Value | null | undefined): value is Local {
  return value != null && value.type === "Local";
}

/*
 * The locals (and field references) written by a statement.
 */
export function getDefs(stmt: Stmt): Array<Local | FieldRef> {
  switch (stmt.type) {
    case "AssignStmt":
    case "IdentityStmt":
      return [stmt.left];
    case "InvokeStmt":
    case "IfStmt":
    case "GotoStmt":
    case "ReturnStmt":
    case "ThrowStmt":
    case "NopStmt":
      return [];
    default:
      unhandledType(stmt);
  }
}

export function getDefinedLocals(stmt: Stmt): Local[] {
  return getDefs(stmt).filter(isLocal);
}

function valueUses(value: Value | null, uses: Local[]) {
  if (!value) return;
  switch (value.type) {
    case "Local":
      uses.push(value);
      return;
    case "FieldRef":
      if (value.base) uses.push(value.base);
      return;
    case "InvokeExpr":
      if (value.base) uses.push(value.base);
      value.args.forEach((arg) => valueUses(arg, uses));
      return;
    case "BinopExpr":
      valueUses(value.left, uses);
      valueUses(value.right, uses);
      return;
    case "Constant":
    case "ParameterRef":
    case "ThisRef":
    case "NewExpr":
      return;
  }
}

export function getUses(stmt: Stmt): Local[] {
  const uses: Local[] = [];
  switch (stmt.type) {
    case "AssignStmt":
      if (stmt.left.type === "FieldRef") valueUses(stmt.left, uses);
      valueUses(stmt.right, uses);
      break;
    case "IdentityStmt":
      break;
    case "InvokeStmt":
      valueUses(stmt.expr, uses);
      break;
    case "IfStmt":
      valueUses(stmt.condition, uses);
      break;
    case "ReturnStmt":
      valueUses(stmt.value, uses);
      break;
    case "ThrowStmt":
      valueUses(stmt.value, uses);
      break;
    case "GotoStmt":
    case "NopStmt":
      break;
    default:
      unhandledType(stmt);
  }
  return uses;
}

export function methodName(method: MethodRef) {
  return `${method.declaringClass}.${method.name}`;
}

export function formatValue(value: Value): string {
  switch (value.type) {
    case "Local":
      return value.name;
    case "Constant":
      return typeof value.value === "string"
        ? JSON.stringify(value.value)
        : String(value.value);
    case "ParameterRef":
      return `@parameter${value.index}`;
    case "ThisRef":
      return "@this";
    case "FieldRef":
      return `${value.base ? value.base.name : "<static>"}.${value.field}`;
    case "InvokeExpr":
      return `${value.base ? `${value.base.name}.` : ""}${
        value.method.name
      }(${value.args.map(formatValue).join(", ")})`;
    case "NewExpr":
      return `new ${value.className}`;
    case "BinopExpr":
      return `${formatValue(value.left)} ${value.operator} ${formatValue(
        value.right
      )}`;
  }
}

export function formatStmt(stmt: Stmt): string {
  const prefix = stmt.label ? `${stmt.label}: ` : "";
  switch (stmt.type) {
    case "AssignStmt":
      return `${prefix}${formatValue(stmt.left)} = ${formatValue(stmt.right)}`;
    case "IdentityStmt":
      return `${prefix}${stmt.left.name} := ${formatValue(stmt.right)}`;
    case "InvokeStmt":
      return `${prefix}${formatValue(stmt.expr)}`;
    case "IfStmt":
      return `${prefix}if ${formatValue(stmt.condition)} goto ${stmt.target}`;
    case "GotoStmt":
      return `${prefix}goto ${stmt.target}`;
    case "ReturnStmt":
      return `${prefix}return${
        stmt.value ? ` ${formatValue(stmt.value)}` : ""
      }`;
    case "ThrowStmt":
      return `${prefix}throw ${stmt.value.name}`;
    case "NopStmt":
      return `${prefix}nop`;
    default:
      unhandledType(stmt);
  }
}
