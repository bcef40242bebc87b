import { Bit, evaluate, Expression, SymbolName } from './ast';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

/**
 * An elective equation in normal form: the complete table of assignments the
 * equation forbids. Entry `i` of `forbidden` belongs to the assignment whose
 * bits spell `i` in binary, with `variables[0]` as the most significant bit.
 */
export type Equation = {
  readonly variables: readonly SymbolName[];
  readonly forbidden: readonly Bit[];
};

export interface EngineConfig {
  /**
   * Refuses to normalize over more variables than this, since the table has
   * 2^n entries. Defaults to `DEFAULT_MAX_VARIABLES`.
   */
  maxVariables?: number;
}

export const DEFAULT_MAX_VARIABLES = 16;

/**
 * Represents a variable list with a malformed or repeated symbol.
 */
export class InvalidVariablesError extends Error {
  constructor(
    message: string,
    public readonly variables: readonly SymbolName[]
  ) {
    super(`${message} in variables [${variables.join(', ')}]`);
    this.name = 'InvalidVariablesError';
  }
}

/**
 * Represents a normalization over more variables than the configured limit.
 */
export class VariableLimitError extends Error {
  constructor(
    public readonly count: number,
    public readonly limit: number
  ) {
    super(`cannot normalize over ${count} variables, the limit is ${limit}`);
    this.name = 'VariableLimitError';
  }
}

/**
 * Yields every assignment of n bits in ascending binary order, first bit
 * most significant.
 */
export function* assignments(n: number): Generator<Bit[]> {
  for (let i = 0; i < 2 ** n; i++) {
    yield toAssignment(i, n);
  }
}

/**
 * Returns the assignment of n bits with table index `i`.
 */
export function toAssignment(i: number, n: number): Bit[] {
  const bits: Bit[] = [];
  for (let k = n - 1; k >= 0; k--) {
    bits.push((i >> k) & 1 ? 1 : 0);
  }
  return bits;
}

/**
 * Returns the table index of an assignment.
 */
export function toIndex(bits: readonly Bit[]): number {
  return bits.reduce<number>((acc, b) => acc * 2 + b, 0);
}

function checkVariables(
  variables: readonly SymbolName[],
  cfg?: EngineConfig
): void {
  const limit = cfg?.maxVariables ?? DEFAULT_MAX_VARIABLES;
  if (variables.length > limit) {
    throw new VariableLimitError(variables.length, limit);
  }

  const seen: Set<SymbolName> = new Set();
  for (const v of variables) {
    if (!/^[a-z]$/.test(v)) {
      throw new InvalidVariablesError(`'${v}' is not a symbol`, variables);
    }
    if (seen.has(v)) {
      throw new InvalidVariablesError(`'${v}' is repeated`, variables);
    }
    seen.add(v);
  }
}

/**
 * Reduces the equation `lhs = rhs` to normal form over the given variables.
 * An assignment is forbidden when the two sides evaluate to different values
 * under it.
 *
 * @throws UnboundSymbolError if either side mentions a symbol outside
 * `variables`
 */
export function normalize(
  lhs: Expression,
  rhs: Expression,
  variables: readonly SymbolName[],
  cfg?: EngineConfig
): Equation {
  checkVariables(variables, cfg);

  const scope = [...variables];
  const forbidden: Bit[] = [];
  for (const values of assignments(scope.length)) {
    const diff = evaluate(lhs, scope, values) - evaluate(rhs, scope, values);
    forbidden.push(diff === 0 ? 0 : 1);
  }

  const eq: Equation = { variables: scope, forbidden };
  debugLogger.logEquation(
    LogComponent.NORMALIZER,
    LogLevel.DEBUG,
    `Normalized over [${scope.join(', ')}]`,
    () => renderEquation(eq)
  );
  return eq;
}

/**
 * Returns true if the equation forbids the given assignment.
 */
export function isForbidden(eq: Equation, values: readonly Bit[]): boolean {
  if (values.length !== eq.variables.length) {
    throw new Error(
      `expected ${eq.variables.length} values for [${eq.variables.join(', ')}], got ${values.length}`
    );
  }
  return eq.forbidden[toIndex(values)] === 1;
}

/** True if the equation forbids nothing, i.e. asserts nothing. */
export function isTautology(eq: Equation): boolean {
  return eq.forbidden.every((f) => f === 0);
}

/** True if the equation forbids every assignment. */
export function isContradiction(eq: Equation): boolean {
  return eq.forbidden.every((f) => f === 1);
}

/** True if both variable lists hold the same symbols in the same order. */
export function sameVariables(
  a: readonly SymbolName[],
  b: readonly SymbolName[]
): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

/**
 * Returns true if the given equations have the same variables and table.
 */
export function equalEquations(a: Equation, b: Equation): boolean {
  return (
    sameVariables(a.variables, b.variables) &&
    a.forbidden.length === b.forbidden.length &&
    a.forbidden.every((f, i) => f === b.forbidden[i])
  );
}

/**
 * Renders an equation as a sum of its forbidden constituents set to zero,
 * e.g. `x(1-y) + (1-x)y = 0`. An equation forbidding nothing is `0 = 0`.
 */
export function renderEquation(eq: Equation): string {
  const terms: string[] = [];
  eq.forbidden.forEach((f, i) => {
    if (f === 0) return;
    const bits = toAssignment(i, eq.variables.length);
    const term = eq.variables
      .map((v, k) => (bits[k] === 1 ? v : `(1-${v})`))
      .join('');
    // with no variables left the only constituent is the unit
    terms.push(term || '1');
  });

  return terms.length ? `${terms.join(' + ')} = 0` : '0 = 0';
}
