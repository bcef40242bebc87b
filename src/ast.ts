/**
 * Types of nodes in the elective function syntax tree:
 */
export const enum NodeKind {
  Sym, // elective symbol x
  Const, // constant 0 or 1
  Not, // negation (1-e)
  Product, // juxtaposition e1e2
}

/** A single lowercase letter naming an elective symbol. */
export type SymbolName = string;

/** A value in the elective domain. */
export type Bit = 0 | 1;

/** Reference to an elective symbol. */
export type Sym = { kind: NodeKind.Sym; name: SymbolName };

/** Constant 0 or 1. */
export type Const = { kind: NodeKind.Const; value: Bit };

/** Negation of an expression, written (1-e). */
export type Not = { kind: NodeKind.Not; arg: Expression };

/** Product of two expressions, written by juxtaposition. */
export type Product = {
  kind: NodeKind.Product;
  left: Expression;
  right: Expression;
};

/**
 * Represents an elective function: an algebraic combination of symbols,
 * constants, negation and product.
 */
export type Expression = Sym | Const | Not | Product;

/**
 * Callbacks for `transform`.
 */
export type TransformFns = {
  Sym?: (e: Sym) => Expression;
  Const?: (e: Const) => Expression;
  Not?: (e: Not) => Expression;
  Product?: (e: Product) => Expression;
};

/**
 * Helper for transforming expressions. Nodes without a callback are rebuilt
 * with transformed children.
 */
export function transform(e: Expression, cbs: TransformFns): Expression {
  switch (e.kind) {
    case NodeKind.Sym:
      return cbs.Sym ? cbs.Sym(e) : e;
    case NodeKind.Const:
      return cbs.Const ? cbs.Const(e) : e;
    case NodeKind.Not: {
      if (cbs.Not) return cbs.Not(e);
      return {
        ...e,
        arg: transform(e.arg, cbs),
      };
    }
    case NodeKind.Product: {
      if (cbs.Product) return cbs.Product(e);
      return {
        ...e,
        left: transform(e.left, cbs),
        right: transform(e.right, cbs),
      };
    }
    default: {
      const _exhaustive: never = e;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Represents a failure to find a symbol among the variables an expression
 * is evaluated over.
 */
export class UnboundSymbolError extends Error {
  constructor(
    public readonly symbol: SymbolName,
    public readonly variables: readonly SymbolName[]
  ) {
    super(
      `symbol '${symbol}' is not bound by the variables [${variables.join(', ')}]`
    );
    this.name = 'UnboundSymbolError';
  }
}

/**
 * Evaluates an expression under ordinary integer arithmetic, where
 * `values[i]` is the value bound to `variables[i]`. Negation is `1 - e` and
 * product is multiplication; nothing here keeps results inside {0,1}.
 */
export function evaluate(
  e: Expression,
  variables: readonly SymbolName[],
  values: readonly number[]
): number {
  switch (e.kind) {
    case NodeKind.Sym: {
      const idx = variables.indexOf(e.name);
      const value = values[idx];
      if (idx < 0 || value === undefined) {
        throw new UnboundSymbolError(e.name, variables);
      }
      return value;
    }
    case NodeKind.Const:
      return e.value;
    case NodeKind.Not:
      return 1 - evaluate(e.arg, variables, values);
    case NodeKind.Product:
      return (
        evaluate(e.left, variables, values) *
        evaluate(e.right, variables, values)
      );
    default: {
      const _exhaustive: never = e;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Returns the distinct symbols of an expression in order of first occurrence.
 */
export function getSymbols(e: Expression): SymbolName[] {
  const seen: Set<SymbolName> = new Set();
  transform(e, {
    Sym: (s) => {
      seen.add(s.name);
      return s;
    },
  });
  return [...seen];
}

/**
 * Returns true if the given expressions are equal syntactically.
 */
export function equal(e: Expression, f: Expression): boolean {
  switch (e.kind) {
    case NodeKind.Sym:
      if (f.kind != NodeKind.Sym) return false;
      return e.name == f.name;
    case NodeKind.Const:
      if (f.kind != NodeKind.Const) return false;
      return e.value == f.value;
    case NodeKind.Not:
      if (f.kind != NodeKind.Not) return false;
      return equal(e.arg, f.arg);
    case NodeKind.Product:
      if (f.kind != NodeKind.Product) return false;
      return equal(e.left, f.left) && equal(e.right, f.right);
    default:
      const _exhaustive: never = e;
      throw new Error(_exhaustive);
  }
}

export type NodeConstructor<T> = (fns: {
  sym: (name: SymbolName) => Sym;
  constant: (value: Bit) => Const;
  not: (arg: Expression) => Not;
  product: (first: Expression, ...rest: Expression[]) => Expression;
}) => T;

/**
 * Higher-level constructor for expressions, for callers that would rather
 * build trees directly than go through the parser. Products of several
 * factors nest to the right, which is the shape the parser produces.
 */
export function construct<T>(nc: NodeConstructor<T>): T {
  const product = (first: Expression, ...rest: Expression[]): Expression => {
    const [next, ...tail] = rest;
    if (next === undefined) return first;
    return { kind: NodeKind.Product, left: first, right: product(next, ...tail) };
  };

  return nc({
    sym: (name: SymbolName) => ({ kind: NodeKind.Sym, name }),
    constant: (value: Bit) => ({ kind: NodeKind.Const, value }),
    not: (arg: Expression) => ({ kind: NodeKind.Not, arg }),
    product,
  });
}
