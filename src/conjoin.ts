import { Bit, SymbolName } from './ast';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';
import { Equation, renderEquation, sameVariables } from './equation';

/**
 * Represents an attempt to combine equations over different variable lists.
 */
export class VariableMismatchError extends Error {
  constructor(
    public readonly left: readonly SymbolName[],
    public readonly right: readonly SymbolName[]
  ) {
    super(
      `cannot conjoin equations over [${left.join(', ')}] and [${right.join(', ')}]`
    );
    this.name = 'VariableMismatchError';
  }
}

/**
 * Returns the equation asserting both `a` and `b`, which forbids every
 * assignment that either of them forbids.
 */
export function conjoin(a: Equation, b: Equation): Equation {
  if (!sameVariables(a.variables, b.variables)) {
    throw new VariableMismatchError(a.variables, b.variables);
  }

  const eq: Equation = {
    variables: [...a.variables],
    forbidden: a.forbidden.map(
      (f, i): Bit => (f === 1 || b.forbidden[i] === 1 ? 1 : 0)
    ),
  };
  debugLogger.logEquation(
    LogComponent.CONJUNCTION,
    LogLevel.TRACE,
    'Conjoined',
    () => `${renderEquation(a)} & ${renderEquation(b)} => ${renderEquation(eq)}`
  );
  return eq;
}

/**
 * Conjoins a non-empty list of equations over the same variables.
 */
export function conjoinAll(equations: readonly Equation[]): Equation {
  const [first, ...rest] = equations;
  if (first === undefined) {
    throw new VariableMismatchError([], []);
  }
  return rest.reduce(conjoin, first);
}
